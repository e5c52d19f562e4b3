#!/usr/bin/env node
/**
 * Keep the output tree in step with the export: full pass at startup,
 * then a coalesced pass after every burst of changes until interrupted.
 */

import { NormalizationPipeline } from './pipeline.js';
import { ChangeWatcher } from './change-watcher.js';
import { ChokidarEventSource } from './event-source.js';
import { ensureDirectories, getFlagValue, loadRuntime } from './runtime.js';
import { abortOnSignals } from './signals.js';
import { toAppError } from './logger.js';

async function main(args: string[]): Promise<number> {
  console.log('👀 Starting export watcher...\n');

  try {
    const { config } = loadRuntime({ configPath: getFlagValue(args, '--config') });
    const { paths, naming, watch } = config;

    ensureDirectories([paths.inputRoot, paths.outputRoot]);

    const pipeline = new NormalizationPipeline(config);
    pipeline.load();

    const watcher = new ChangeWatcher(
      pipeline,
      new ChokidarEventSource({ ignoreNames: naming.ignoreNames }),
      { root: paths.inputRoot, coalesceMs: watch.coalesceMs, maxDelayMs: watch.maxDelayMs }
    );

    const controller = new AbortController();
    abortOnSignals(controller);

    console.log('\n✅ Watcher active. Press Ctrl+C to stop.');
    await watcher.run(controller.signal);
    return 0;
  } catch (error) {
    toAppError(error, 'watch');
    return 1;
  }
}

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
});
