#!/usr/bin/env node
/**
 * One-shot normalization: materialize the export, rewrite links, save the mapping
 *
 * Usage: normalize [--config path] [--input dir] [--output dir] [--print-config]
 */

import { NormalizationPipeline } from './pipeline.js';
import { ensureDirectories, getFlagValue, loadRuntime } from './runtime.js';
import { logger, toAppError } from './logger.js';

async function main(args: string[]): Promise<number> {
  try {
    const { config, configManager } = loadRuntime({
      configPath: getFlagValue(args, '--config'),
      overrides: {
        paths: {
          inputRoot: getFlagValue(args, '--input'),
          outputRoot: getFlagValue(args, '--output'),
        },
      },
    });

    if (args.includes('--print-config')) {
      console.log(configManager.toYAML());
      return 0;
    }

    ensureDirectories([config.paths.outputRoot]);

    const pipeline = new NormalizationPipeline(config);
    pipeline.load();
    const summary = await pipeline.runPass('cli');

    console.log('\n📊 Pass summary:');
    const { materialize, rewrite } = summary;
    console.log(`  Files: ${materialize.files} (${materialize.written + rewrite.filesChanged} written, ${materialize.unchanged + rewrite.unchanged} unchanged)`);
    console.log(`  Links rewritten: ${rewrite.linksRewritten}, unresolved: ${rewrite.unresolved}`);
    console.log(`  Failures: ${materialize.failed + rewrite.failed}`);
    console.log(`  Mapping: ${pipeline.store.getPath()} (${pipeline.store.size} entries)`);

    logger.info('File processing completed successfully', undefined, 'normalize');
    return 0;
  } catch (error) {
    toAppError(error, 'normalize');
    return 1;
  }
}

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
});
