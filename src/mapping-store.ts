/**
 * Original-path to canonical-path table, persisted as a readable mapping file
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, posix } from 'path';
import { withNumericSuffix } from './canonicalizer.js';
import { logger, errorMessage } from './logger.js';
import type { EntryKind, MappingEntry } from './types.js';

const SEPARATOR = ' -> ';
const LOG_CONTEXT = 'MappingStore';

/**
 * The part of the store the link rewriter may see.
 */
export interface MappingReader {
  lookup(raw: string): string | undefined;
  getEntry(raw: string): MappingEntry | undefined;
  findByBasename(name: string): MappingEntry[];
}

export class MappingStore implements MappingReader {
  private byRaw = new Map<string, MappingEntry>();
  private byCanonical = new Map<string, string>();

  constructor(private mappingFile: string) {}

  get size(): number {
    return this.byRaw.size;
  }

  getPath(): string {
    return this.mappingFile;
  }

  /**
   * Canonical path for `raw`, disambiguated against every other entry.
   *
   * A raw path already mapped to `desired` or one of its numbered variants
   * keeps that mapping, so repeated passes agree with earlier ones.
   */
  assign(raw: string, desired: string, kind: EntryKind): string {
    const existing = this.byRaw.get(raw);
    if (existing && existing.kind === kind && isVariantOf(existing.canonical, desired)) {
      return existing.canonical;
    }

    let candidate = desired;
    for (let n = 1; this.isTakenByOther(candidate, raw); n++) {
      candidate = posix.join(posix.dirname(desired), withNumericSuffix(posix.basename(desired), n));
    }

    if (candidate !== desired) {
      logger.info(
        `Name collision: ${raw} -> ${candidate}`,
        { desired, heldBy: this.byCanonical.get(desired) },
        LOG_CONTEXT
      );
    }

    this.record(raw, candidate, kind);
    return candidate;
  }

  /**
   * Add or overwrite an entry verbatim.
   */
  record(raw: string, canonical: string, kind: EntryKind): void {
    const previous = this.byRaw.get(raw);
    if (previous) {
      if (previous.canonical === canonical && previous.kind === kind) return;
      if (this.byCanonical.get(previous.canonical) === raw) {
        this.byCanonical.delete(previous.canonical);
      }
    }

    this.byRaw.set(raw, { raw, canonical, kind });
    this.byCanonical.set(canonical, raw);
  }

  private isTakenByOther(candidate: string, raw: string): boolean {
    const owner = this.byCanonical.get(candidate);
    return owner !== undefined && owner !== raw;
  }

  lookup(raw: string): string | undefined {
    return this.byRaw.get(raw)?.canonical;
  }

  getEntry(raw: string): MappingEntry | undefined {
    const entry = this.byRaw.get(raw);
    return entry ? { ...entry } : undefined;
  }

  findByBasename(name: string): MappingEntry[] {
    const matches: MappingEntry[] = [];
    for (const entry of this.byRaw.values()) {
      if (posix.basename(entry.raw) === name) matches.push({ ...entry });
    }
    return matches;
  }

  entries(): MappingEntry[] {
    return [...this.byRaw.values()]
      .map(entry => ({ ...entry }))
      .sort((a, b) => compareStrings(a.raw, b.raw));
  }

  /**
   * Mapping file contents: one `raw -> canonical` line per entry,
   * directories marked with a trailing `/`.
   */
  serialize(): string {
    return this.entries()
      .map(entry => {
        const mark = entry.kind === 'directory' ? '/' : '';
        return `${entry.raw}${mark}${SEPARATOR}${entry.canonical}${mark}\n`;
      })
      .join('');
  }

  /**
   * Write the mapping file. Failures are logged and reported, never thrown:
   * the file is for inspection, the in-memory table stays authoritative.
   */
  persist(): boolean {
    try {
      mkdirSync(dirname(this.mappingFile), { recursive: true });
      writeFileSync(this.mappingFile, this.serialize());
      logger.debug(`Mapping saved`, { path: this.mappingFile, entries: this.size }, LOG_CONTEXT);
      return true;
    } catch (error) {
      logger.error(
        `Failed to save mapping file ${this.mappingFile}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined,
        LOG_CONTEXT
      );
      return false;
    }
  }

  /**
   * Restore entries from a previous run. Returns the number of entries read.
   */
  load(): number {
    if (!existsSync(this.mappingFile)) {
      logger.info(`No mapping file at ${this.mappingFile}, starting empty`, undefined, LOG_CONTEXT);
      return 0;
    }

    let content: string;
    try {
      content = readFileSync(this.mappingFile, 'utf-8');
    } catch (error) {
      logger.error(
        `Failed to read mapping file ${this.mappingFile}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined,
        LOG_CONTEXT
      );
      return 0;
    }

    let loaded = 0;
    content.split('\n').forEach((line, index) => {
      if (line.trim() === '') return;
      const parsed = parseLine(line);
      if (!parsed) {
        logger.warn(`Skipping malformed mapping line ${index + 1}`, { line }, LOG_CONTEXT);
        return;
      }
      this.record(parsed.raw, parsed.canonical, parsed.kind);
      loaded++;
    });

    logger.info(`Loaded ${loaded} mapping entries`, { path: this.mappingFile }, LOG_CONTEXT);
    return loaded;
  }
}

function parseLine(line: string): { raw: string; canonical: string; kind: EntryKind } | null {
  // Canonical names hold no spaces, so the last separator is the real one.
  const at = line.lastIndexOf(SEPARATOR);
  if (at <= 0) return null;

  let raw = line.slice(0, at);
  let canonical = line.slice(at + SEPARATOR.length).trim();
  if (canonical === '') return null;

  const kind: EntryKind = canonical.endsWith('/') ? 'directory' : 'file';
  if (kind === 'directory') {
    canonical = canonical.slice(0, -1);
    raw = raw.endsWith('/') ? raw.slice(0, -1) : raw;
  }

  if (raw === '' || canonical === '') return null;
  return { raw, canonical, kind };
}

/**
 * `Foo_2.md` is a variant of `Foo.md`; so is `Foo.md` itself.
 */
export function isVariantOf(candidate: string, desired: string): boolean {
  if (candidate === desired) return true;
  if (posix.dirname(candidate) !== posix.dirname(desired)) return false;

  const name = posix.basename(candidate);
  const base = posix.basename(desired);
  const suffixed = withNumericSuffix(base, 0);
  const stemEnd = suffixed.lastIndexOf('_0');
  const prefix = suffixed.slice(0, stemEnd + 1);
  const extension = suffixed.slice(stemEnd + 2);

  if (!name.startsWith(prefix) || !name.endsWith(extension)) return false;
  const counter = name.slice(prefix.length, name.length - extension.length);
  return /^[1-9]\d*$/.test(counter);
}

/**
 * Locale-independent ordering for paths.
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
