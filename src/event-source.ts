/**
 * File-system change notifications behind a small capability interface
 */

import { basename } from 'path';
import chokidar from 'chokidar';
import { isTempFileName } from './fs-utils.js';
import { logger } from './logger.js';

const LOG_CONTEXT = 'EventSource';

/**
 * Receives create/modify notifications for paths under a watched root.
 */
export interface ChangeHandler {
  onCreate(path: string): void;
  onModify(path: string): void;
}

export interface Subscription {
  close(): Promise<void>;
}

export interface ChangeEventSource {
  subscribe(root: string, handler: ChangeHandler): Promise<Subscription>;
}

export interface ChokidarSourceOptions {
  /** Subdirectory levels to follow; undefined follows all */
  depth?: number;
  /** Entry names never reported */
  ignoreNames?: string[];
  /** Wait for writes to settle this long before reporting a file */
  stabilityThresholdMs?: number;
}

/**
 * Paths never reported: configured names and in-flight temp files.
 */
export function isIgnoredPath(path: string, ignoreNames: ReadonlySet<string>): boolean {
  const name = basename(path);
  return ignoreNames.has(name) || isTempFileName(name);
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class ChokidarEventSource implements ChangeEventSource {
  constructor(private options: ChokidarSourceOptions = {}) {}

  subscribe(root: string, handler: ChangeHandler): Promise<Subscription> {
    const ignoreNames = new Set(this.options.ignoreNames ?? []);
    const stabilityThreshold = this.options.stabilityThresholdMs ?? 200;

    const watcher = chokidar.watch(root, {
      persistent: true,
      ignoreInitial: true, // Files already present are covered by the initial pass
      depth: this.options.depth,
      ignored: (path: string) => isIgnoredPath(path, ignoreNames),
      awaitWriteFinish: stabilityThreshold > 0 ? { stabilityThreshold, pollInterval: 50 } : false,
    });

    watcher.on('add', path => handler.onCreate(path));
    watcher.on('addDir', path => handler.onCreate(path));
    watcher.on('change', path => handler.onModify(path));
    watcher.on('error', error => {
      logger.error(`Watcher error on ${root}`, asError(error), LOG_CONTEXT);
    });

    return new Promise((resolvePromise, rejectPromise) => {
      // An error before 'ready' means the subscription never started.
      const failStartup = (error: unknown): void => {
        watcher.off('ready', onReady);
        const reject = (): void => rejectPromise(asError(error));
        watcher.close().then(reject, reject);
      };
      const onReady = (): void => {
        watcher.off('error', failStartup);
        logger.debug(`Subscribed to ${root}`, undefined, LOG_CONTEXT);
        resolvePromise({ close: () => watcher.close() });
      };

      watcher.once('error', failStartup);
      watcher.once('ready', onReady);
    });
  }
}
