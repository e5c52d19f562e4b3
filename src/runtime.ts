/**
 * Process bootstrap shared by the CLIs: environment, config, log file, directories
 */

import { mkdirSync } from 'fs';
import { config as loadEnv } from 'dotenv';
import { ConfigManager, type AppConfig, type PartialAppConfig } from './config.js';
import { AppError, logger, errorMessage } from './logger.js';

export interface Runtime {
  config: AppConfig;
  configManager: ConfigManager;
}

export interface RuntimeOptions {
  configPath?: string;
  overrides?: PartialAppConfig;
  env?: NodeJS.ProcessEnv;
}

/**
 * Value following `--name` (or given as `--name=value`) in `args`.
 */
export function getFlagValue(args: string[], name: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === name) return args[i + 1];
    if (arg.startsWith(`${name}=`)) return arg.slice(name.length + 1);
  }
  return undefined;
}

export function loadRuntime(options: RuntimeOptions = {}): Runtime {
  loadEnv();
  const env = options.env ?? process.env;

  const configManager = new ConfigManager(
    options.configPath ?? env.NORMALIZER_CONFIG ?? './config.yaml',
    env
  );
  if (options.overrides) {
    configManager.override(options.overrides);
  }

  const { valid, errors } = configManager.validate();
  if (!valid) {
    throw new AppError(`Invalid configuration: ${errors.join('; ')}`, 'INVALID_CONFIG', { errors });
  }

  const config = configManager.getAll();
  logger.setMinLevel(config.logLevel);
  logger.setLogFile(config.paths.logFile);

  return { config, configManager };
}

/**
 * Create each directory if missing. Failing here stops startup.
 */
export function ensureDirectories(directories: string[]): void {
  for (const directory of directories) {
    try {
      mkdirSync(directory, { recursive: true });
      logger.info(`Directory ensured at: ${directory}`, undefined, 'Runtime');
    } catch (error) {
      throw new AppError(
        `Failed to create directory ${directory}: ${errorMessage(error)}`,
        'DIRECTORY_SETUP_FAILED',
        { directory }
      );
    }
  }
}
