/**
 * Unpack export archives dropped into the staging directory into the input root
 */

import { mkdir, readFile } from 'fs/promises';
import { dirname, extname, join, posix, resolve } from 'path';
import JSZip from 'jszip';
import pRetry, { AbortError } from 'p-retry';
import type { ChangeEventSource, ChangeHandler } from './event-source.js';
import { atomicWrite, isErrnoException } from './fs-utils.js';
import { logger, errorMessage } from './logger.js';
import { waitForAbort } from './signals.js';

const LOG_CONTEXT = 'ArchiveExtractor';

export interface ArchiveExtractorOptions {
  watchDir: string;
  inputRoot: string;
  /** Extra attempts while an archive is still being copied in */
  retries: number;
  minTimeoutMs: number;
}

export interface ExtractionResult {
  archive: string;
  files: number;
  skipped: string[];
  ok: boolean;
}

/**
 * Entry path inside the target root, or `null` when it would escape it.
 */
export function safeEntryPath(entryName: string): string | null {
  const normalized = posix.normalize(entryName.replace(/\\/g, '/'));
  if (
    normalized.startsWith('/') ||
    /^[A-Za-z]:/.test(normalized) ||
    normalized === '..' ||
    normalized.startsWith('../')
  ) {
    return null;
  }
  return normalized.replace(/\/+$/, '');
}

export class ArchiveExtractor implements ChangeHandler {
  private processed = new Set<string>();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private source: ChangeEventSource,
    private options: ArchiveExtractorOptions
  ) {}

  onCreate(path: string): void {
    if (extname(path).toLowerCase() !== '.zip') return;

    const archive = resolve(path);
    if (this.processed.has(archive)) return;
    this.processed.add(archive);

    // One archive at a time, in arrival order
    this.queue = this.queue.then(() => this.extract(archive));
  }

  onModify(_path: string): void {
    // Archives are extracted once, when they appear
  }

  /**
   * Resolves once every archive seen so far has been handled.
   */
  async idle(): Promise<void> {
    await this.queue;
  }

  async run(signal: AbortSignal): Promise<void> {
    await mkdir(this.options.watchDir, { recursive: true });
    await mkdir(this.options.inputRoot, { recursive: true });

    const subscription = await this.source.subscribe(this.options.watchDir, this);
    logger.info(`Watching for new zip files in ${this.options.watchDir}`, undefined, LOG_CONTEXT);

    try {
      await waitForAbort(signal);
      logger.info('Stopping watch due to interrupt', undefined, LOG_CONTEXT);
    } finally {
      await subscription.close();
      await this.idle();
    }
  }

  /**
   * Extract one archive. Failures are logged and reported in the result.
   */
  async extract(archivePath: string): Promise<ExtractionResult> {
    const result: ExtractionResult = { archive: archivePath, files: 0, skipped: [], ok: false };

    try {
      const zip = await pRetry(
        async () => {
          try {
            return await JSZip.loadAsync(await readFile(archivePath));
          } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
              throw new AbortError(error);
            }
            throw error;
          }
        },
        {
          retries: this.options.retries,
          minTimeout: this.options.minTimeoutMs,
          factor: 2,
          onFailedAttempt: error => {
            logger.warn(
              `Opening ${archivePath} failed (attempt ${error.attemptNumber}): ${error.message}`,
              { retriesLeft: error.retriesLeft },
              LOG_CONTEXT
            );
          },
        }
      );

      for (const entry of Object.values(zip.files)) {
        const relativePath = safeEntryPath(entry.name);
        if (relativePath === null || relativePath === '' || relativePath === '.') {
          logger.warn(`Skipping unsafe entry ${entry.name} in ${archivePath}`, undefined, LOG_CONTEXT);
          result.skipped.push(entry.name);
          continue;
        }

        const target = join(this.options.inputRoot, relativePath);
        if (entry.dir) {
          await mkdir(target, { recursive: true });
          continue;
        }

        await mkdir(dirname(target), { recursive: true });
        await atomicWrite(target, await entry.async('nodebuffer'));
        result.files++;
      }

      result.ok = true;
      logger.info(`Extracted: ${archivePath} to ${this.options.inputRoot}`, { files: result.files }, LOG_CONTEXT);
    } catch (error) {
      logger.error(
        `Failed to extract ${archivePath}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined,
        LOG_CONTEXT
      );
    }

    return result;
  }
}
