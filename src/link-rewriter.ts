/**
 * Rewrite internal markdown links to canonical targets and write the result
 */

import { join, posix } from 'path';
import { safeDecode } from './canonicalizer.js';
import { compareStrings, type MappingReader } from './mapping-store.js';
import {
  extractLinks,
  isExternalTarget,
  replaceSpans,
  splitTarget,
  type TargetReplacement,
} from './markdown-links.js';
import { atomicWrite, readIfExists } from './fs-utils.js';
import { logger, errorMessage } from './logger.js';
import type { RewriteSummary, SourceDocument } from './types.js';

const LOG_CONTEXT = 'LinkRewriter';

export interface LinkRewriterOptions {
  outputRoot: string;
}

export type Resolution =
  | { kind: 'raw'; canonical: string; via: 'relative' | 'root' | 'basename' }
  | { kind: 'ambiguous'; candidates: string[] }
  | { kind: 'unresolved' };

export interface ContentRewrite {
  content: string;
  rewritten: number;
  unchanged: number;
  unresolved: string[];
}

export function emptyRewriteSummary(): RewriteSummary {
  return { files: 0, filesChanged: 0, unchanged: 0, linksRewritten: 0, linksUnchanged: 0, unresolved: 0, failed: 0 };
}

/**
 * Normalize a joined POSIX path; `null` when it climbs above the root.
 */
function withinRoot(path: string): string | null {
  const normalized = posix.normalize(path).replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../') || normalized.startsWith('/')) return null;
  return normalized === '.' ? '' : normalized;
}

/**
 * `to` expressed relative to the directory `fromDir` (both root-relative).
 */
export function relativeTarget(fromDir: string, to: string): string {
  const relative = posix.relative(posix.join('/', fromDir), posix.join('/', to));
  return relative === '' ? '.' : relative;
}

export class LinkRewriter {
  constructor(
    private store: MappingReader,
    private options: LinkRewriterOptions
  ) {}

  /**
   * Write the output of every markdown input read by the materializer pass.
   * Links are always rewritten from the input bytes, and an output is only
   * written when it differs from what is on disk.
   */
  async processLinks(documents: SourceDocument[]): Promise<RewriteSummary> {
    const summary = emptyRewriteSummary();
    const ordered = [...documents].sort((a, b) => compareStrings(a.canonical, b.canonical));

    for (const document of ordered) {
      summary.files++;
      await this.processDocument(document, summary);
    }

    logger.info(
      `Rewrote ${summary.linksRewritten} links, wrote ${summary.filesChanged} files`,
      { ...summary },
      LOG_CONTEXT
    );
    return summary;
  }

  private async processDocument(document: SourceDocument, summary: RewriteSummary): Promise<void> {
    const { raw, canonical } = document;
    const result = this.rewriteContent(document.content.toString('utf-8'), raw, canonical);

    summary.linksRewritten += result.rewritten;
    summary.linksUnchanged += result.unchanged;
    summary.unresolved += result.unresolved.length;

    for (const target of result.unresolved) {
      logger.warn(`Unresolved link in ${canonical}: ${target}`, undefined, LOG_CONTEXT);
    }

    // Untouched documents keep their exact input bytes.
    const content = result.rewritten > 0 ? Buffer.from(result.content, 'utf-8') : document.content;
    const outputPath = join(this.options.outputRoot, canonical);

    try {
      const current = await readIfExists(outputPath);
      if (current && current.equals(content)) {
        summary.unchanged++;
        return;
      }

      await atomicWrite(outputPath, content);
      summary.filesChanged++;
      logger.info(`Processed: ${raw} -> ${canonical}`, { rewritten: result.rewritten }, LOG_CONTEXT);
    } catch (error) {
      logger.error(`Failed to write ${canonical}: ${errorMessage(error)}`, error instanceof Error ? error : undefined, LOG_CONTEXT);
      summary.failed++;
    }
  }

  /**
   * Rewrite the links of one input file's content. `rawFile` and
   * `canonicalFile` locate the file in the input and output trees.
   */
  rewriteContent(content: string, rawFile: string, canonicalFile: string): ContentRewrite {
    const replacements: TargetReplacement[] = [];
    const unresolved: string[] = [];
    let unchanged = 0;
    const canonicalDir = posix.dirname(canonicalFile);

    for (const link of extractLinks(content)) {
      if (isExternalTarget(link.target)) continue;

      const { path, suffix } = splitTarget(link.target);
      const resolution = this.resolveTarget(path, rawFile);

      switch (resolution.kind) {
        case 'raw': {
          const value = relativeTarget(canonicalDir, resolution.canonical) + suffix;
          if (value === link.target) {
            unchanged++;
          } else {
            replacements.push({ start: link.start, end: link.end, value });
          }
          break;
        }
        case 'ambiguous':
          unresolved.push(`${link.target} (matches ${resolution.candidates.join(', ')})`);
          break;
        case 'unresolved':
          unresolved.push(link.target);
          break;
      }
    }

    return {
      content: replaceSpans(content, replacements),
      rewritten: replacements.length,
      unchanged,
      unresolved,
    };
  }

  /**
   * Resolution order, always against raw paths:
   * 1. relative to the file's raw directory (`/x` is taken from the input root);
   * 2. relative to the input root;
   * 3. a bare file name held by exactly one raw file.
   */
  resolveTarget(path: string, rawFile: string): Resolution {
    const decoded = safeDecode(path);
    if (decoded.replace(/\/+$/, '') === '') return { kind: 'unresolved' };

    const rootRelative = decoded.startsWith('/');

    const fromRawDir = rootRelative
      ? withinRoot(decoded.slice(1))
      : withinRoot(posix.join(posix.dirname(rawFile), decoded));
    const relativeHit = fromRawDir ? this.store.lookup(fromRawDir) : undefined;
    if (relativeHit !== undefined) {
      return { kind: 'raw', canonical: relativeHit, via: 'relative' };
    }

    if (!rootRelative) {
      const fromRoot = withinRoot(decoded);
      const rootHit = fromRoot ? this.store.lookup(fromRoot) : undefined;
      if (rootHit !== undefined) {
        return { kind: 'raw', canonical: rootHit, via: 'root' };
      }
    }

    if (!decoded.includes('/')) {
      const matches = this.store.findByBasename(decoded).filter(entry => entry.kind === 'file');
      if (matches.length === 1) {
        return { kind: 'raw', canonical: matches[0].canonical, via: 'basename' };
      }
      if (matches.length > 1) {
        return { kind: 'ambiguous', candidates: matches.map(entry => entry.raw).sort(compareStrings) };
      }
    }

    return { kind: 'unresolved' };
  }
}
