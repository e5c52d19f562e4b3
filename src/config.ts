/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import { logger, isLogLevel, errorMessage, type LogLevel } from './logger.js';

export interface PathsConfig {
  /** Extracted export, read only */
  inputRoot: string;
  /** Canonical tree, written only by the pipeline */
  outputRoot: string;
  mappingFile: string;
  logFile: string;
  /** Staging directory watched for archives */
  watchDir: string;
}

export interface NamingConfig {
  dateSeparators: string;
  minIdentifierLength: number;
  placeholder: string;
  markdownExtensions: string[];
  ignoreNames: string[];
}

export interface WatchConfig {
  coalesceMs: number;
  maxDelayMs: number;
}

export interface CombinedConfig {
  enabled: boolean;
  path: string;
}

export interface ArchiveConfig {
  retries: number;
  minTimeoutMs: number;
}

export interface AppConfig {
  paths: PathsConfig;
  naming: NamingConfig;
  watch: WatchConfig;
  combined: CombinedConfig;
  archive: ArchiveConfig;
  logLevel: LogLevel;
}

export type PartialAppConfig = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

export const DEFAULT_CONFIG: AppConfig = {
  paths: {
    inputRoot: './data',
    outputRoot: './output',
    mappingFile: './state/mapping.txt',
    logFile: './logs/normalizer.log',
    watchDir: './watch'
  },
  naming: {
    dateSeparators: ' _-.',
    minIdentifierLength: 6,
    placeholder: 'untitled',
    markdownExtensions: ['.md', '.markdown'],
    ignoreNames: ['.DS_Store', '__MACOSX', 'Thumbs.db']
  },
  watch: {
    coalesceMs: 500,
    maxDelayMs: 5000
  },
  combined: {
    enabled: false,
    path: './combined/combined.md'
  },
  archive: {
    retries: 3,
    minTimeoutMs: 500
  },
  logLevel: 'info'
};

const SECTIONS = ['paths', 'naming', 'watch', 'combined', 'archive'] as const;

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge user config with defaults (user config takes precedence)
 */
export function mergeConfigs(defaults: AppConfig, user: unknown): AppConfig {
  const merged = cloneConfig(defaults);
  if (!isRecord(user)) return merged;

  for (const section of SECTIONS) {
    const value = user[section];
    if (value === null || value === undefined) continue;
    if (!isRecord(value)) {
      logger.warn(`Ignoring non-object config section "${section}"`, undefined, 'ConfigManager');
      continue;
    }
    Object.assign(merged[section], stripUndefined(value));
  }

  if (user.logLevel !== undefined) {
    if (isLogLevel(user.logLevel)) {
      merged.logLevel = user.logLevel;
    } else {
      logger.warn(`Ignoring unknown log level "${String(user.logLevel)}"`, undefined, 'ConfigManager');
    }
  }

  return merged;
}

function stripUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== null && entry !== undefined)
  );
}

/**
 * Environment variables that override file configuration
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const next = cloneConfig(config);
  if (env.NORMALIZER_INPUT_ROOT) next.paths.inputRoot = env.NORMALIZER_INPUT_ROOT;
  if (env.NORMALIZER_OUTPUT_ROOT) next.paths.outputRoot = env.NORMALIZER_OUTPUT_ROOT;
  if (env.NORMALIZER_WATCH_DIR) next.paths.watchDir = env.NORMALIZER_WATCH_DIR;
  if (isLogLevel(env.LOG_LEVEL)) next.logLevel = env.LOG_LEVEL;
  return next;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = './config.yaml', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.config = applyEnvOverrides(this.loadConfig(), env);
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.info(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      return mergeConfigs(DEFAULT_CONFIG, parsed);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${errorMessage(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Apply command-line overrides on top of the loaded configuration
   */
  override(overrides: PartialAppConfig): void {
    this.config = mergeConfigs(this.config, overrides);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { paths, naming, watch, archive, combined } = this.config;

    for (const key of ['inputRoot', 'outputRoot', 'mappingFile', 'logFile', 'watchDir'] as const) {
      if (typeof paths[key] !== 'string' || paths[key].trim() === '') {
        errors.push(`paths.${key} must be a non-empty string`);
      }
    }

    if (paths.inputRoot === paths.outputRoot) {
      errors.push('paths.inputRoot and paths.outputRoot must differ');
    }

    if (typeof naming.dateSeparators !== 'string' || naming.dateSeparators.length === 0) {
      errors.push('naming.dateSeparators must list at least one character');
    }

    if (!Number.isInteger(naming.minIdentifierLength) || naming.minIdentifierLength < 2) {
      errors.push('naming.minIdentifierLength must be an integer of at least 2');
    }

    if (!/^[\p{L}\p{N}]+(?:_[\p{L}\p{N}]+)*$/u.test(naming.placeholder)) {
      errors.push('naming.placeholder must be letters and digits joined by underscores');
    }

    if (!Array.isArray(naming.markdownExtensions) || naming.markdownExtensions.some(ext => !ext.startsWith('.'))) {
      errors.push('naming.markdownExtensions must be extensions starting with "."');
    }

    if (watch.coalesceMs < 0 || watch.maxDelayMs < watch.coalesceMs) {
      errors.push('watch.maxDelayMs must be at least watch.coalesceMs, both non-negative');
    }

    if (!Number.isInteger(archive.retries) || archive.retries < 0) {
      errors.push('archive.retries must be a non-negative integer');
    }

    if (combined.enabled && combined.path.trim() === '') {
      errors.push('combined.path is required when combined.enabled is set');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config);
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}
