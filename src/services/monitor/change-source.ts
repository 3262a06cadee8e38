// File system change source backed by chokidar

import * as path from 'path';
import { watch, FSWatcher } from 'chokidar';
import { Logger } from '../../core/logger.js';
import { createPathMatcher, matchesGlob } from '../../core/path-matcher.js';
import type { ChangeEvent, ChangeSource } from '../../models/monitor.js';
import type { ChangeKind } from '../../models/types.js';

export interface ChokidarChangeSourceOptions {
  projectRoot: string;
  watchPatterns: string[];
  ignorePatterns: string[];
  /** Poll instead of using native events */
  usePolling?: boolean;
}

const EVENT_KINDS: Record<string, ChangeKind> = {
  add: 'created',
  change: 'modified',
  unlink: 'deleted'
};

/**
 * Watches the project tree and emits project-relative change events
 */
export class ChokidarChangeSource implements ChangeSource {
  private watcher: FSWatcher | null = null;
  private readonly log = Logger.getInstance().child('watch');

  constructor(private readonly options: ChokidarChangeSourceOptions) {}

  async start(emit: (event: ChangeEvent) => void): Promise<void> {
    if (this.watcher) {
      await this.stop();
    }

    const root = path.resolve(this.options.projectRoot);
    const matcher = createPathMatcher(this.options.watchPatterns, this.options.ignorePatterns);
    const relative = (absolute: string): string => path.relative(root, absolute).split(path.sep).join('/');

    const watcher = watch(root, {
      ignoreInitial: true,
      persistent: true,
      usePolling: this.options.usePolling ?? false,
      // prune ignored directories before descending into them
      ignored: (candidate: string) => {
        const rel = relative(candidate);
        return rel !== '' && this.options.ignorePatterns.some(pattern => matchesGlob(rel, pattern));
      }
    });
    this.watcher = watcher;

    watcher.on('all', (eventName: string, absolute: string) => {
      const kind = EVENT_KINDS[eventName];
      const rel = relative(absolute);
      if (!kind || !matcher.matches(rel)) return;
      emit({ path: rel, kind, timestamp: Date.now() });
    });
    watcher.on('error', (error: unknown) => {
      this.log.warn(`Watcher error: ${error instanceof Error ? error.message : String(error)}`);
    });

    await new Promise<void>(resolve => watcher.once('ready', () => resolve()));
    this.log.debug(`Watching ${root}`, { patterns: this.options.watchPatterns });
  }

  async stop(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
    }
  }
}
