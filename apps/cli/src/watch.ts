import chokidar, { FSWatcher } from 'chokidar';
import * as path from 'path';
import type { JsonPromptStore } from './jsonStore';
import { createLogger } from './log';

const log = createLogger('watch');

export const DEBOUNCE_MS = 1000;
export const POLL_INTERVAL_MS = 2000;

export interface ChangeMonitorOptions {
  folders: string[];
  files: string[];
  shouldMonitor(filePath: string): boolean;
  /** Foreground handler; the only place batches touch prompt state */
  onBatch(paths: string[]): void | Promise<void>;
  debounceMs?: number;
}

/**
 * Watches the monitored folders and files. Events only queue paths; after a
 * quiet period the whole pending set is handed to onBatch, one batch at a
 * time.
 */
export class ChangeMonitor {
  private watcher: FSWatcher | null = null;
  private readonly pending = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private chain: Promise<void> = Promise.resolve();
  private readonly debounceMs: number;

  constructor(private readonly options: ChangeMonitorOptions) {
    this.debounceMs = options.debounceMs ?? DEBOUNCE_MS;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  watchTargets(): string[] {
    const targets = new Set<string>();
    for (const folder of this.options.folders) {
      targets.add(path.resolve(folder));
    }
    for (const file of this.options.files) {
      targets.add(path.dirname(path.resolve(file)));
    }
    return Array.from(targets);
  }

  start(): void {
    if (this.watcher) {
      return;
    }
    const targets = this.watchTargets();
    this.watcher = chokidar.watch(targets, {
      ignoreInitial: true,
      persistent: true,
      awaitWriteFinish: {
        stabilityThreshold: 300,
        pollInterval: 100,
      },
    });

    this.watcher.on('change', (filePath: string) => this.enqueue(filePath));
    this.watcher.on('add', (filePath: string) => this.enqueue(filePath));
    this.watcher.on('error', (error: unknown) => log.warn('Watcher error', error));

    log.info(`Watching ${targets.length} location(s)`);
  }

  /**
   * Queue a changed path and restart the debounce timer
   */
  enqueue(filePath: string): void {
    const resolved = path.resolve(filePath);
    if (!this.options.shouldMonitor(resolved)) {
      return;
    }
    this.pending.add(resolved);
    log.debug(`Change detected in file: ${resolved}`);

    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.chain = this.chain.then(() => this.runBatch());
    }, this.debounceMs);
  }

  /**
   * Hand the pending set to the handler now and wait for it
   */
  flush(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.chain = this.chain.then(() => this.runBatch());
    return this.chain;
  }

  /**
   * Close the watcher, cancel the timer and wait for a running batch.
   * Pending paths that never reached a batch are dropped.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
    }
    await this.chain;
    this.pending.clear();
  }

  private async runBatch(): Promise<void> {
    if (this.pending.size === 0) {
      return;
    }
    const batch = Array.from(this.pending);
    this.pending.clear();
    try {
      await this.options.onBatch(batch);
    } catch (error) {
      log.error(`Failed to process ${batch.length} changed file(s)`, error);
    }
  }
}

/**
 * Polls a JSON prompts file that other processes write and calls back when
 * its mtime or entry count changes.
 */
export class RecordFilePoller {
  private interval: NodeJS.Timeout | null = null;
  private running: Promise<boolean | void> = Promise.resolve();
  private last: { mtimeMs: number; count: number } | null = null;

  constructor(
    private readonly store: JsonPromptStore,
    private readonly onChange: () => void | Promise<void>,
    private readonly intervalMs: number = POLL_INTERVAL_MS
  ) {}

  start(): void {
    if (this.interval) {
      return;
    }
    this.last = this.store.stat();
    this.interval = setInterval(() => {
      this.running = this.running.then(() => this.check());
    }, this.intervalMs);
  }

  /**
   * Compare the file against the last observation. Returns true when the
   * callback ran.
   */
  async check(): Promise<boolean> {
    const current = this.store.stat();
    const previous = this.last;
    const changed =
      (current === null) !== (previous === null) ||
      (current !== null &&
        previous !== null &&
        (current.mtimeMs !== previous.mtimeMs || current.count !== previous.count));
    this.last = current;
    if (!changed) {
      return false;
    }

    log.debug(`${this.store.filePath} changed, reloading prompts`);
    try {
      await this.onChange();
    } catch (error) {
      log.error(`Failed to reload after ${this.store.filePath} changed`, error);
    }
    return true;
  }

  async stop(): Promise<void> {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    await this.running;
  }
}
