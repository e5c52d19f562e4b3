/**
 * Mirror the input tree into the output root under canonical names
 */

import { existsSync, type Dirent } from 'fs';
import { mkdir, readFile, readdir } from 'fs/promises';
import { join, posix } from 'path';
import {
  canonicalizeDirectoryName,
  canonicalizeFileName,
  type CanonicalizerOptions,
} from './canonicalizer.js';
import { MappingStore, compareStrings } from './mapping-store.js';
import { isMarkdownFile } from './markdown-links.js';
import { atomicWrite, isTempFileName, readIfExists } from './fs-utils.js';
import { logger, errorMessage } from './logger.js';
import type { MaterializeResult, MaterializeSummary } from './types.js';

const LOG_CONTEXT = 'TreeMaterializer';

export interface MaterializerOptions {
  inputRoot: string;
  outputRoot: string;
  naming?: Partial<CanonicalizerOptions>;
  /** Entry names skipped wherever they appear */
  ignoreNames?: string[];
  /** Files handed to the link rewriter instead of being copied */
  markdownExtensions?: string[];
}

export function emptyMaterializeSummary(): MaterializeSummary {
  return { directories: 0, files: 0, written: 0, unchanged: 0, skipped: 0, failed: 0, collisions: 0 };
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export class TreeMaterializer {
  private ignoreNames: Set<string>;
  private markdownExtensions: string[];

  constructor(
    private store: MappingStore,
    private options: MaterializerOptions
  ) {
    this.ignoreNames = new Set(options.ignoreNames ?? []);
    this.markdownExtensions = options.markdownExtensions ?? ['.md', '.markdown'];
  }

  /**
   * Walk the whole input root, assign every name and bring copied files up
   * to date. Markdown inputs come back as documents for the link rewriter.
   * Safe to repeat: unchanged inputs leave their outputs untouched.
   */
  async processAll(): Promise<MaterializeResult> {
    const state: MaterializeResult = { summary: emptyMaterializeSummary(), documents: [] };
    const { summary } = state;
    const { inputRoot, outputRoot } = this.options;

    if (!existsSync(inputRoot)) {
      logger.error(`Data directory not found: ${inputRoot}`, undefined, LOG_CONTEXT);
      summary.failed++;
      return state;
    }

    try {
      await mkdir(outputRoot, { recursive: true });
    } catch (error) {
      logger.error(`Failed to create output directory ${outputRoot}: ${errorMessage(error)}`, asError(error), LOG_CONTEXT);
      summary.failed++;
      return state;
    }

    await this.walk('', '', state);

    logger.info(
      `Materialized ${summary.files} files in ${summary.directories} directories`,
      { ...summary, documents: state.documents.length },
      LOG_CONTEXT
    );
    return state;
  }

  private async walk(rawDir: string, canonicalDir: string, state: MaterializeResult): Promise<void> {
    const { summary } = state;
    let entries: Dirent[];
    try {
      entries = await readdir(join(this.options.inputRoot, rawDir), { withFileTypes: true });
    } catch (error) {
      logger.error(`Failed to read directory ${rawDir || '.'}: ${errorMessage(error)}`, asError(error), LOG_CONTEXT);
      summary.failed++;
      return;
    }

    entries.sort((a, b) => compareStrings(a.name, b.name));
    const parentName = canonicalDir === '' ? undefined : posix.basename(canonicalDir);

    for (const entry of entries) {
      if (this.ignoreNames.has(entry.name) || isTempFileName(entry.name)) {
        summary.skipped++;
        continue;
      }

      const raw = rawDir === '' ? entry.name : posix.join(rawDir, entry.name);

      if (entry.isDirectory()) {
        await this.materializeDirectory(raw, entry.name, canonicalDir, state);
      } else if (entry.isFile()) {
        await this.materializeFile(raw, entry.name, canonicalDir, parentName, state);
      } else {
        logger.debug(`Skipping non-regular entry ${raw}`, undefined, LOG_CONTEXT);
        summary.skipped++;
      }
    }
  }

  private async materializeDirectory(
    raw: string,
    name: string,
    canonicalDir: string,
    state: MaterializeResult
  ): Promise<void> {
    const { summary } = state;
    const desired = posix.join(canonicalDir, canonicalizeDirectoryName(name, this.options.naming));
    const canonical = this.store.assign(raw, desired, 'directory');
    if (canonical !== desired) summary.collisions++;

    try {
      await mkdir(join(this.options.outputRoot, canonical), { recursive: true });
    } catch (error) {
      // Left for the next pass; nothing below it can be written now.
      logger.error(`Failed to create directory ${canonical}: ${errorMessage(error)}`, asError(error), LOG_CONTEXT);
      summary.failed++;
      return;
    }

    summary.directories++;
    await this.walk(raw, canonical, state);
  }

  private async materializeFile(
    raw: string,
    name: string,
    canonicalDir: string,
    parentName: string | undefined,
    state: MaterializeResult
  ): Promise<void> {
    const { summary } = state;
    let content: Buffer;
    try {
      content = await readFile(join(this.options.inputRoot, raw));
    } catch (error) {
      logger.error(`Error processing file ${raw}: ${errorMessage(error)}`, asError(error), LOG_CONTEXT);
      summary.failed++;
      return;
    }

    const desired = posix.join(canonicalDir, canonicalizeFileName(name, parentName, this.options.naming));
    const canonical = this.store.assign(raw, desired, 'file');
    if (canonical !== desired) summary.collisions++;
    summary.files++;

    if (isMarkdownFile(name, this.markdownExtensions)) {
      state.documents.push({ raw, canonical, content });
      return;
    }

    const outputPath = join(this.options.outputRoot, canonical);
    try {
      const current = await readIfExists(outputPath);
      if (current && current.equals(content)) {
        summary.unchanged++;
        return;
      }

      await atomicWrite(outputPath, content);
      summary.written++;
      logger.info(`Processed: ${raw} -> ${canonical}`, undefined, LOG_CONTEXT);
    } catch (error) {
      // Stays absent until a later pass succeeds.
      logger.error(`Failed to write ${canonical}: ${errorMessage(error)}`, asError(error), LOG_CONTEXT);
      summary.failed++;
    }
  }
}
