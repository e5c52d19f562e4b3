/**
 * Concatenate the output tree's markdown into one delimited digest file
 */

import { readFile } from 'fs/promises';
import { dirname, posix, relative, resolve } from 'path';
import glob from 'fast-glob';
import { compareStrings } from './mapping-store.js';
import { extractLinks, isExternalTarget, replaceSpans, splitTarget } from './markdown-links.js';
import { atomicWrite, readIfExists, toPosixPath } from './fs-utils.js';
import { logger, errorMessage } from './logger.js';

const LOG_CONTEXT = 'CombinedWriter';

export interface CombinedWriterOptions {
  outputRoot: string;
  combinedPath: string;
  markdownExtensions: string[];
}

/**
 * First `# Heading`, else the first non-empty line without heading marks.
 */
export function extractTitle(content: string): string | null {
  const heading = /^#\s+(.+)$/m.exec(content);
  if (heading) return heading[1].trim();

  const firstLine = content.trim().split('\n')[0]?.trim();
  if (firstLine) {
    return firstLine.replace(/^#+\s*/, '') || null;
  }

  return null;
}

/**
 * Re-point relative links written for `fromDir` so they work from `toDir`.
 */
export function rebaseLinks(content: string, fromDir: string, toDir: string): string {
  const replacements = extractLinks(content)
    .filter(link => !isExternalTarget(link.target) && !link.target.startsWith('/'))
    .map(link => {
      const { path, suffix } = splitTarget(link.target);
      const target = resolve(fromDir, path);
      const rebased = toPosixPath(relative(toDir, target)) || '.';
      return { start: link.start, end: link.end, value: rebased + suffix };
    });

  return replaceSpans(content, replacements);
}

export class CombinedWriter {
  constructor(private options: CombinedWriterOptions) {}

  /**
   * Build the digest. Resolves to true when the file on disk changed.
   */
  async write(): Promise<boolean> {
    const { outputRoot, combinedPath, markdownExtensions } = this.options;
    const targetPath = resolve(combinedPath);
    const targetDir = dirname(targetPath);

    try {
      const files = await glob(
        markdownExtensions.map(ext => `**/*${ext}`),
        { cwd: outputRoot, onlyFiles: true, caseSensitiveMatch: false }
      );

      const sections: string[] = [];
      for (const file of files.sort(compareStrings)) {
        const filePath = resolve(outputRoot, file);
        if (filePath === targetPath) continue;

        const content = await readFile(filePath, 'utf-8');
        const title = extractTitle(content) ?? posix.parse(file).name;
        const body = rebaseLinks(content.trim(), dirname(filePath), targetDir);
        sections.push(`--- ${title} ---\n${body}\n`);
      }

      const combined = sections.join('\n');
      const current = await readIfExists(targetPath);
      if (current && current.toString('utf-8') === combined) {
        return false;
      }

      await atomicWrite(targetPath, combined);
      logger.info(`Created combined file at: ${combinedPath}`, { sections: sections.length }, LOG_CONTEXT);
      return true;
    } catch (error) {
      logger.error(`Error creating combined file: ${errorMessage(error)}`, error instanceof Error ? error : undefined, LOG_CONTEXT);
      return false;
    }
  }
}
