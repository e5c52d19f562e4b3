#!/usr/bin/env node
/**
 * Extract zip archives dropped into the staging directory into the input root
 */

import { ArchiveExtractor } from './archive-extractor.js';
import { ChokidarEventSource } from './event-source.js';
import { ensureDirectories, getFlagValue, loadRuntime } from './runtime.js';
import { abortOnSignals } from './signals.js';
import { toAppError } from './logger.js';

async function main(args: string[]): Promise<number> {
  try {
    const { config } = loadRuntime({ configPath: getFlagValue(args, '--config') });
    const { paths, archive } = config;

    ensureDirectories([paths.watchDir, paths.inputRoot]);

    const extractor = new ArchiveExtractor(
      new ChokidarEventSource({ depth: 0, stabilityThresholdMs: 1000 }),
      {
        watchDir: paths.watchDir,
        inputRoot: paths.inputRoot,
        retries: archive.retries,
        minTimeoutMs: archive.minTimeoutMs,
      }
    );

    const controller = new AbortController();
    abortOnSignals(controller);

    await extractor.run(controller.signal);
    return 0;
  } catch (error) {
    toAppError(error, 'archive-watch');
    return 1;
  }
}

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
});
