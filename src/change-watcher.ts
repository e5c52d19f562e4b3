/**
 * Trigger normalization passes from file-system notifications, coalescing bursts
 */

import type { ChangeEventSource, ChangeHandler, Subscription } from './event-source.js';
import type { PassRunner } from './pipeline.js';
import { logger } from './logger.js';
import { waitForAbort } from './signals.js';

const LOG_CONTEXT = 'ChangeWatcher';

export interface ChangeWatcherOptions {
  root: string;
  /** Quiet period that closes a burst */
  coalesceMs: number;
  /** Longest a burst may postpone its pass */
  maxDelayMs: number;
}

export class ChangeWatcher implements ChangeHandler {
  private pending = new Set<string>();
  private burstStartedAt: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private subscription: Subscription | null = null;
  private stopped = false;
  private triggered = 0;

  constructor(
    private runner: PassRunner,
    private source: ChangeEventSource,
    private options: ChangeWatcherOptions
  ) {}

  get passesTriggered(): number {
    return this.triggered;
  }

  get pendingPaths(): string[] {
    return [...this.pending];
  }

  onCreate(path: string): void {
    this.schedule('created', path);
  }

  onModify(path: string): void {
    this.schedule('modified', path);
  }

  /**
   * Subscribe, run the initial full pass, then follow changes until `signal`
   * aborts. An in-flight pass always completes before this resolves.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.stopped = false;
    this.subscription = await this.source.subscribe(this.options.root, this);
    logger.info(`Watching ${this.options.root} for changes`, undefined, LOG_CONTEXT);

    try {
      await this.runner.runPass('initial');
      await waitForAbort(signal);
    } finally {
      await this.stop();
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.pending.size > 0) {
      logger.info(`Dropping ${this.pending.size} pending change(s) on shutdown`, undefined, LOG_CONTEXT);
      this.pending.clear();
    }
    this.burstStartedAt = null;

    if (this.subscription) {
      await this.subscription.close();
      this.subscription = null;
    }

    await this.runner.idle();
    logger.info('Watcher stopped', undefined, LOG_CONTEXT);
  }

  private schedule(kind: 'created' | 'modified', path: string): void {
    if (this.stopped) return;

    logger.debug(`File ${kind}: ${path}`, undefined, LOG_CONTEXT);
    this.pending.add(path);

    const now = Date.now();
    if (this.burstStartedAt === null) this.burstStartedAt = now;

    // Debounce, but never past maxDelayMs from the first event of the burst
    if (this.timer) clearTimeout(this.timer);
    const remaining = this.options.maxDelayMs - (now - this.burstStartedAt);
    const delay = Math.max(0, Math.min(this.options.coalesceMs, remaining));
    this.timer = setTimeout(() => this.flush(), delay);
  }

  private flush(): void {
    this.timer = null;
    this.burstStartedAt = null;
    const paths = [...this.pending];
    this.pending.clear();
    if (paths.length === 0 || this.stopped) return;

    this.triggered++;
    logger.info(`Change detected: ${paths.length} path(s)`, { first: paths[0] }, LOG_CONTEXT);

    this.runner.runPass(`${paths.length} change(s)`).then(
      summary => {
        logger.debug(`Triggered pass done`, { durationMs: summary.durationMs }, LOG_CONTEXT);
      },
      (error: unknown) => {
        logger.error('Triggered pass failed', error instanceof Error ? error : new Error(String(error)), LOG_CONTEXT);
      }
    );
  }
}
