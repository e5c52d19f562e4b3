import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ChangeWatcher } from './change-watcher.js';
import type { ChangeEventSource, ChangeHandler, Subscription } from './event-source.js';
import type { PassRunner } from './pipeline.js';
import type { PassSummary } from './types.js';
import { emptyMaterializeSummary } from './tree-materializer.js';
import { emptyRewriteSummary } from './link-rewriter.js';
import { logger } from './logger.js';

function passSummary(reason: string): PassSummary {
  return {
    reason,
    materialize: emptyMaterializeSummary(),
    rewrite: emptyRewriteSummary(),
    combinedWritten: false,
    mappingPersisted: true,
    durationMs: 1,
  };
}

class FakeEventSource implements ChangeEventSource {
  handler: ChangeHandler | null = null;
  root: string | null = null;
  close = vi.fn(async () => {});

  async subscribe(root: string, handler: ChangeHandler): Promise<Subscription> {
    this.root = root;
    this.handler = handler;
    return { close: this.close };
  }
}

class FakeRunner implements PassRunner {
  runPass = vi.fn(async (reason: string) => passSummary(reason));
  idle = vi.fn(async () => {});
}

describe('ChangeWatcher', () => {
  let runner: FakeRunner;
  let source: FakeEventSource;

  beforeEach(() => {
    logger.clear();
    runner = new FakeRunner();
    source = new FakeEventSource();
  });

  describe('coalescing', () => {
    let watcher: ChangeWatcher;

    beforeEach(() => {
      vi.useFakeTimers();
      watcher = new ChangeWatcher(runner, source, { root: 'input', coalesceMs: 500, maxDelayMs: 1200 });
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should collapse a burst into one pass', async () => {
      watcher.onCreate('input/a.md');
      watcher.onModify('input/b.png');
      watcher.onModify('input/a.md');

      await vi.advanceTimersByTimeAsync(499);
      expect(runner.runPass).not.toHaveBeenCalled();
      expect(watcher.pendingPaths).toEqual(['input/a.md', 'input/b.png']);

      await vi.advanceTimersByTimeAsync(1);
      expect(runner.runPass).toHaveBeenCalledTimes(1);
      expect(runner.runPass).toHaveBeenCalledWith('2 change(s)');
      expect(watcher.passesTriggered).toBe(1);
      expect(watcher.pendingPaths).toEqual([]);
    });

    it('should restart the quiet period on every event', async () => {
      watcher.onCreate('input/a.md');
      await vi.advanceTimersByTimeAsync(300);
      watcher.onCreate('input/b.md');
      await vi.advanceTimersByTimeAsync(300);

      expect(runner.runPass).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(200);
      expect(runner.runPass).toHaveBeenCalledTimes(1);
    });

    it('should not postpone a pass beyond the maximum delay', async () => {
      watcher.onCreate('input/1.md');
      await vi.advanceTimersByTimeAsync(400);
      watcher.onCreate('input/2.md');
      await vi.advanceTimersByTimeAsync(400);
      watcher.onCreate('input/3.md');

      await vi.advanceTimersByTimeAsync(399);
      expect(runner.runPass).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(runner.runPass).toHaveBeenCalledWith('3 change(s)');
    });

    it('should start a new burst after a flush', async () => {
      watcher.onCreate('input/a.md');
      await vi.advanceTimersByTimeAsync(500);
      watcher.onModify('input/a.md');
      await vi.advanceTimersByTimeAsync(500);

      expect(runner.runPass).toHaveBeenCalledTimes(2);
      expect(watcher.passesTriggered).toBe(2);
    });

    it('should log a failed triggered pass', async () => {
      runner.runPass.mockRejectedValueOnce(new Error('disk full'));

      watcher.onCreate('input/a.md');
      await vi.advanceTimersByTimeAsync(500);
      await vi.waitFor(() => expect(logger.getLogs('error')).toHaveLength(1));

      const errors = logger.getLogs('error');
      expect(errors[0].message).toBe('Triggered pass failed');
      expect(errors[0].error?.message).toBe('disk full');
    });
  });

  describe('run', () => {
    it('should subscribe, run the initial pass and stop on abort', async () => {
      const watcher = new ChangeWatcher(runner, source, { root: 'input', coalesceMs: 1000, maxDelayMs: 5000 });
      const controller = new AbortController();

      const running = watcher.run(controller.signal);
      await vi.waitFor(() => expect(runner.runPass).toHaveBeenCalledWith('initial'));
      expect(source.root).toBe('input');

      source.handler?.onCreate('input/late.md');
      expect(watcher.pendingPaths).toEqual(['input/late.md']);

      controller.abort();
      await running;

      expect(watcher.pendingPaths).toEqual([]);
      expect(runner.runPass).toHaveBeenCalledTimes(1);
      expect(source.close).toHaveBeenCalledTimes(1);
      expect(runner.idle).toHaveBeenCalledTimes(1);
    });

    it('should wait for the in-flight pass before resolving', async () => {
      let finishPass: () => void = () => {};
      runner.idle.mockImplementationOnce(
        () => new Promise<void>(resolvePromise => {
          finishPass = resolvePromise;
        })
      );
      const watcher = new ChangeWatcher(runner, source, { root: 'input', coalesceMs: 1000, maxDelayMs: 5000 });
      const controller = new AbortController();

      let settled = false;
      const running = watcher.run(controller.signal).then(() => {
        settled = true;
      });
      await vi.waitFor(() => expect(runner.runPass).toHaveBeenCalled());

      controller.abort();
      await vi.waitFor(() => expect(runner.idle).toHaveBeenCalled());
      expect(settled).toBe(false);

      finishPass();
      await running;
      expect(settled).toBe(true);
    });

    it('should ignore events after stopping', async () => {
      const watcher = new ChangeWatcher(runner, source, { root: 'input', coalesceMs: 10, maxDelayMs: 50 });
      const controller = new AbortController();
      controller.abort();

      await watcher.run(controller.signal);
      source.handler?.onCreate('input/after.md');

      expect(watcher.pendingPaths).toEqual([]);
      expect(runner.runPass).toHaveBeenCalledTimes(1);
    });
  });
});
