/**
 * Shared types for the export normalizer
 */

export type EntryKind = 'file' | 'directory';

/**
 * One original path and where it lives in the output tree.
 * Both paths are POSIX and relative to their roots.
 */
export interface MappingEntry {
  raw: string;
  canonical: string;
  kind: EntryKind;
}

/**
 * A markdown input read during a walk. Its output is written by the link
 * rewriter once every name of the pass is known.
 */
export interface SourceDocument {
  raw: string;
  canonical: string;
  content: Buffer;
}

/**
 * A markdown link occurrence. `start`/`end` delimit the target inside the file.
 */
export interface LinkReference {
  text: string;
  target: string;
  start: number;
  end: number;
  image: boolean;
}

export interface MaterializeSummary {
  directories: number;
  files: number;
  written: number;
  unchanged: number;
  skipped: number;
  failed: number;
  collisions: number;
}

export interface MaterializeResult {
  summary: MaterializeSummary;
  documents: SourceDocument[];
}

export interface RewriteSummary {
  files: number;
  filesChanged: number;
  unchanged: number;
  linksRewritten: number;
  linksUnchanged: number;
  unresolved: number;
  failed: number;
}

export interface PassSummary {
  reason: string;
  materialize: MaterializeSummary;
  rewrite: RewriteSummary;
  combinedWritten: boolean;
  mappingPersisted: boolean;
  durationMs: number;
}
