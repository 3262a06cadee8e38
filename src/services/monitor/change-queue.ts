// Bounded change queue that coalesces repeated events per path

import type { ChangeEvent } from '../../models/monitor.js';
import type { OverflowPolicy } from '../../models/types.js';

export type EnqueueResult = 'queued' | 'coalesced' | 'dropped-oldest' | 'dropped-newest';

/**
 * FIFO of pending file changes.
 *
 * A path appears at most once: a new event for a queued path replaces the
 * queued one in place. When full, `drop-oldest` evicts the head and
 * `drop-newest` rejects the incoming event.
 */
export class ChangeQueue {
  private readonly events = new Map<string, ChangeEvent>();
  private droppedCount = 0;

  constructor(
    private readonly capacity: number,
    private readonly policy: OverflowPolicy = 'drop-oldest'
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(event: ChangeEvent): EnqueueResult {
    if (this.events.has(event.path)) {
      this.events.set(event.path, event);
      return 'coalesced';
    }

    if (this.events.size >= this.capacity) {
      this.droppedCount++;
      if (this.policy === 'drop-newest') {
        return 'dropped-newest';
      }
      const oldest = this.events.keys().next();
      if (!oldest.done) {
        this.events.delete(oldest.value);
      }
      this.events.set(event.path, event);
      return 'dropped-oldest';
    }

    this.events.set(event.path, event);
    return 'queued';
  }

  /**
   * Puts back an event that could not be processed. A newer event for the
   * same path, queued meanwhile, takes precedence.
   */
  requeue(event: ChangeEvent): EnqueueResult {
    const queued = this.events.get(event.path);
    if (queued && queued.timestamp >= event.timestamp) {
      return 'coalesced';
    }
    return this.push(event);
  }

  /**
   * Removes and returns up to `max` events, oldest first
   */
  drain(max: number): ChangeEvent[] {
    const batch: ChangeEvent[] = [];
    for (const [path, event] of this.events) {
      if (batch.length >= max) break;
      batch.push(event);
      this.events.delete(path);
    }
    return batch;
  }

  get size(): number {
    return this.events.size;
  }

  /** Events lost to overflow since creation */
  get dropped(): number {
    return this.droppedCount;
  }
}
