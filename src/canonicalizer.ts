/**
 * Name canonicalization for exported notes.
 *
 * Turns names such as `10 24 2024 - Event Bridge 129d6bbdbbea80` into
 * `Event_Bridge`. Everything here is pure: the same raw name and parent
 * always give the same result.
 */

import { extname } from 'path';

export interface CanonicalizerOptions {
  /** Characters accepted between the parts of a numeric date */
  dateSeparators: string;
  /** Shortest hex run treated as an export identifier */
  minIdentifierLength: number;
  /** Name used when nothing is left after cleaning */
  placeholder: string;
}

export const DEFAULT_CANONICALIZER_OPTIONS: CanonicalizerOptions = {
  dateSeparators: ' _-.',
  minIdentifierLength: 6,
  placeholder: 'untitled',
};

const PERCENT_ESCAPE = /%[0-9A-Fa-f]{2}/;
const UUID = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/i;
const APOSTROPHES = /['’]/g;
const NON_WORD_RUN = /[^\p{L}\p{N}]+/gu;
const EXTENSION = /^\.[A-Za-z0-9]{1,10}$/;

const datePatternCache = new Map<string, RegExp>();
const identifierPatternCache = new Map<number, RegExp>();

/**
 * Decode `%XX` escapes. A malformed sequence leaves the name untouched.
 */
export function safeDecode(value: string): string {
  if (!PERCENT_ESCAPE.test(value)) return value;
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * The extension kept verbatim on a file name; `.2 abc123` is not one.
 */
export function fileExtension(name: string): string {
  const extension = extname(name);
  return EXTENSION.test(extension) ? extension : '';
}

function escapeForCharClass(chars: string): string {
  return chars.replace(/[\\\]\[^-]/g, '\\$&');
}

function datePattern(separators: string): RegExp {
  let pattern = datePatternCache.get(separators);
  if (!pattern) {
    const sep = `[${escapeForCharClass(separators)}]+`;
    const dayOrMonth = '\\d{1,2}';
    pattern = new RegExp(
      `(?<!\\d)(?:${dayOrMonth}${sep}${dayOrMonth}${sep}\\d{4}|\\d{4}${sep}${dayOrMonth}${sep}${dayOrMonth})(?!\\d)`,
      'g'
    );
    datePatternCache.set(separators, pattern);
  }
  return pattern;
}

function identifierPattern(minLength: number): RegExp {
  let pattern = identifierPatternCache.get(minLength);
  if (!pattern) {
    pattern = new RegExp(`(?:^|[\\s_-]+)((?:${UUID.source})|[0-9a-f]{${minLength},})$`, 'i');
    identifierPatternCache.set(minLength, pattern);
  }
  return pattern;
}

/**
 * Remove numeric date tokens (`10 24 2024`, `2024-10-24`, ...).
 */
export function stripDates(name: string, separators: string = DEFAULT_CANONICALIZER_OPTIONS.dateSeparators): string {
  return name.replace(datePattern(separators), ' ');
}

/**
 * Remove one trailing export identifier: a UUID, or a hex run that mixes
 * digits and letters. Plain words (`Decade`) and plain numbers (`123456`) stay.
 */
export function stripIdentifier(name: string, minLength: number = DEFAULT_CANONICALIZER_OPTIONS.minIdentifierLength): string {
  const trimmed = name.trimEnd();
  const match = identifierPattern(minLength).exec(trimmed);
  if (!match) return name;

  const block = match[1];
  const looksGenerated = UUID.test(block) || (/\d/.test(block) && /[a-f]/i.test(block));
  if (!looksGenerated) return name;

  return trimmed.slice(0, match.index);
}

/**
 * Collapse every run of spaces, dashes, underscores and punctuation to one `_`.
 */
export function collapseSeparators(name: string): string {
  return name
    .replace(APOSTROPHES, '')
    .replace(NON_WORD_RUN, '_')
    .replace(/^_+|_+$/g, '');
}

function cleanStem(stem: string, options: CanonicalizerOptions): string {
  const withoutDates = stripDates(stem, options.dateSeparators);
  const withoutId = stripIdentifier(withoutDates, options.minIdentifierLength);
  const collapsed = collapseSeparators(withoutId);
  return collapsed || options.placeholder;
}

function resolveOptions(options?: Partial<CanonicalizerOptions>): CanonicalizerOptions {
  return { ...DEFAULT_CANONICALIZER_OPTIONS, ...options };
}

export function canonicalizeDirectoryName(raw: string, options?: Partial<CanonicalizerOptions>): string {
  return cleanStem(safeDecode(raw), resolveOptions(options));
}

/**
 * Canonical file name. With `parentName` (the parent folder's canonical name)
 * the result is prefixed `<parent>_`, unless it already starts that way.
 */
export function canonicalizeFileName(
  raw: string,
  parentName?: string,
  options?: Partial<CanonicalizerOptions>
): string {
  const resolved = resolveOptions(options);
  const decoded = safeDecode(raw);
  const extension = fileExtension(decoded);
  const stem = decoded.slice(0, decoded.length - extension.length);

  let base = cleanStem(stem, resolved);
  if (parentName && base !== parentName && !base.startsWith(`${parentName}_`)) {
    base = `${parentName}_${base}`;
  }

  return `${base}${extension}`;
}

/**
 * `Foo.md` -> `Foo_2.md`; `Foo` -> `Foo_2`.
 */
export function withNumericSuffix(name: string, n: number): string {
  const extension = fileExtension(name);
  const stem = name.slice(0, name.length - extension.length);
  return `${stem}_${n}${extension}`;
}
