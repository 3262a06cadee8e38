// Alert store for persistence of alerts

import * as fs from 'fs/promises';
import * as path from 'path';
import { StorageError, describeError } from '../../core/errors.js';
import { AlertStoreFileSchema, formatZodIssues, type AlertStoreFile } from '../../core/schemas.js';
import { alertSeverityRank, type AlertSeverity } from '../../models/types.js';
import type { Alert, AlertFilters } from '../../models/alert.js';
import { SerialLock } from './serial-lock.js';

/**
 * Configuration for the alert store
 */
export interface AlertStoreConfig {
  /** JSON file holding all alerts; in-memory only when omitted */
  filePath?: string;
}

function indexKey(resolved: boolean, severity: AlertSeverity): string {
  return `${resolved ? 'resolved' : 'open'}:${severity}`;
}

function formatId(sequence: number): string {
  return `ALERT-${sequence.toString().padStart(6, '0')}`;
}

function sequenceOf(id: string): number {
  return Number.parseInt(id.slice(id.indexOf('-') + 1), 10);
}

/**
 * Orders IDs by sequence number so ALERT-999999 precedes ALERT-1000000
 */
export function compareAlertIds(a: string, b: string): number {
  return sequenceOf(a) - sequenceOf(b);
}

function copy(alert: Alert): Alert {
  return structuredClone(alert);
}

/**
 * Alert store keyed by id
 *
 * Keeps a fingerprint index over open alerts and a (resolved, severity)
 * index. Mutations must run inside `exclusive()`; every write replaces the
 * file atomically through a temp file and rename.
 */
export class AlertStore {
  private readonly config: AlertStoreConfig;
  private readonly lock = new SerialLock();
  private alerts = new Map<string, Alert>();
  private openByFingerprint = new Map<string, string>();
  private byStatusSeverity = new Map<string, Set<string>>();
  private nextSequence = 1;

  constructor(config: AlertStoreConfig = {}) {
    this.config = config;
  }

  /**
   * Loads alerts from the file; a missing file leaves the store empty
   */
  async load(): Promise<void> {
    if (!this.config.filePath) return;

    let content: string;
    try {
      content = await fs.readFile(this.config.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return;
      }
      throw new StorageError(`Cannot read alert store: ${describeError(error)}`, { filePath: this.config.filePath });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`Alert store is not valid JSON: ${describeError(error)}`, { filePath: this.config.filePath });
    }

    const result = AlertStoreFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new StorageError(`Alert store is invalid: ${formatZodIssues(result.error).join('; ')}`, {
        filePath: this.config.filePath
      });
    }

    this.alerts.clear();
    this.openByFingerprint.clear();
    this.byStatusSeverity.clear();
    for (const alert of result.data.alerts) {
      this.index(alert);
    }
    this.nextSequence = Math.max(result.data.nextSequence, this.alerts.size + 1);
  }

  /**
   * Runs a read-modify-write section under the single-writer lock
   */
  exclusive<T>(task: () => Promise<T> | T): Promise<T> {
    return this.lock.run(task);
  }

  /**
   * Reserves the next sequential alert id
   */
  allocateId(): string {
    return formatId(this.nextSequence++);
  }

  /**
   * Inserts or replaces an alert and persists the store
   *
   * When the write fails the in-memory state is restored and the error propagates.
   */
  async put(alert: Alert): Promise<void> {
    const previous = this.alerts.get(alert.id);
    const stored = copy(alert);
    if (previous) {
      this.unindex(previous);
    }
    this.index(stored);

    try {
      await this.persist();
    } catch (error) {
      this.unindex(stored);
      if (previous) {
        this.index(previous);
      } else {
        this.alerts.delete(alert.id);
        if (sequenceOf(alert.id) === this.nextSequence - 1) {
          this.nextSequence--;
        }
      }
      throw error;
    }
  }

  get(id: string): Alert | null {
    const alert = this.alerts.get(id);
    return alert ? copy(alert) : null;
  }

  findOpenByFingerprint(fingerprint: string): Alert | null {
    const id = this.openByFingerprint.get(fingerprint);
    return id ? this.get(id) : null;
  }

  /**
   * Lists alerts matching the filters, oldest first
   */
  list(filters: AlertFilters = {}): Alert[] {
    let candidates: Iterable<Alert> = this.alerts.values();

    const severity = filters.severity;
    if (severity) {
      const statuses = filters.resolved === undefined ? [false, true] : [filters.resolved];
      const ids = statuses.flatMap(resolved => [...(this.byStatusSeverity.get(indexKey(resolved, severity)) ?? [])]);
      candidates = ids.flatMap(id => {
        const alert = this.alerts.get(id);
        return alert ? [alert] : [];
      });
    }

    const minRank = filters.minSeverity ? alertSeverityRank(filters.minSeverity) : -1;
    const since = filters.since?.getTime();

    const results: Alert[] = [];
    for (const alert of candidates) {
      if (filters.resolved !== undefined && alert.resolved !== filters.resolved) continue;
      if (filters.type && alert.type !== filters.type) continue;
      if (alertSeverityRank(alert.severity) < minRank) continue;
      if (filters.filePath && alert.context['filePath'] !== filters.filePath) continue;
      if (since !== undefined && Date.parse(alert.lastSeenAt) < since) continue;
      results.push(copy(alert));
    }

    return results.sort((a, b) => compareAlertIds(a.id, b.id));
  }

  size(): number {
    return this.alerts.size;
  }

  /**
   * Resolves once all queued mutations have settled
   */
  idle(): Promise<void> {
    return this.lock.idle();
  }

  private index(alert: Alert): void {
    this.alerts.set(alert.id, alert);
    if (!alert.resolved) {
      this.openByFingerprint.set(alert.fingerprint, alert.id);
    }

    const key = indexKey(alert.resolved, alert.severity);
    const ids = this.byStatusSeverity.get(key) ?? new Set<string>();
    ids.add(alert.id);
    this.byStatusSeverity.set(key, ids);
  }

  private unindex(alert: Alert): void {
    if (this.openByFingerprint.get(alert.fingerprint) === alert.id) {
      this.openByFingerprint.delete(alert.fingerprint);
    }
    this.byStatusSeverity.get(indexKey(alert.resolved, alert.severity))?.delete(alert.id);
  }

  private async persist(): Promise<void> {
    const filePath = this.config.filePath;
    if (!filePath) return;

    const snapshot: AlertStoreFile = {
      version: 1,
      nextSequence: this.nextSequence,
      alerts: [...this.alerts.values()].sort((a, b) => compareAlertIds(a.id, b.id))
    };

    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8');
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      throw new StorageError(`Cannot write alert store: ${describeError(error)}`, { filePath });
    }
  }
}
