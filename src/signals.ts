/**
 * Cancellation helpers for the long-running watchers
 */

import { logger } from './logger.js';

/**
 * Resolves when `signal` aborts; immediately if it already has.
 */
export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise(resolvePromise => {
    signal.addEventListener('abort', () => resolvePromise(), { once: true });
  });
}

/**
 * Abort `controller` on the first SIGINT or SIGTERM.
 */
export function abortOnSignals(controller: AbortController, signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info(`Received ${signal}, shutting down`, undefined, 'Signals');
      controller.abort();
    });
  }
}
