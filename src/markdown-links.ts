/**
 * Markdown link scanning: `[text](target)` and `![alt](target)` outside code
 */

import type { LinkReference } from './types.js';

// 1: image bang, 2: text, 3: space after "(", 4: target, optional title after it.
// A target with unencoded spaces is taken when it holds no parenthesis or `"`.
const LINK_PATTERN =
  /(!?)\[((?:[^[\]\n]|\[[^[\]\n]*\])*)\]\(([ \t]*)(<[^<>\n]*>|[^\s()<>]*(?:\([^\s()]*\)[^\s()<>]*)*|[^\s()<>"][^()<>"\n]*[^\s()<>"])(?:[ \t]+(?:"[^"\n]*"|'[^'\n]*'|\([^()\n]*\)))?[ \t]*\)/g;

const FENCE = /^ {0,3}(`{3,}|~{3,})/;
const INLINE_CODE = /(`+)[^`\n](?:[^\n]*?[^`\n])?\1(?!`)/g;
const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

function blank(text: string): string {
  return text.replace(/[^\n]/g, ' ');
}

/**
 * Replace fenced blocks and inline code spans with spaces, keeping offsets.
 */
export function maskCode(content: string): string {
  let fence: string | null = null;

  return content
    .split('\n')
    .map(line => {
      const marker = FENCE.exec(line);
      if (fence) {
        if (marker && marker[1][0] === fence[0] && marker[1].length >= fence.length && line.trim() === marker[1]) {
          fence = null;
        }
        return blank(line);
      }
      if (marker) {
        fence = marker[1];
        return blank(line);
      }
      return line.replace(INLINE_CODE, blank);
    })
    .join('\n');
}

export function extractLinks(content: string): LinkReference[] {
  const masked = maskCode(content);
  const links: LinkReference[] = [];

  for (const match of masked.matchAll(LINK_PATTERN)) {
    const index = match.index ?? 0;
    const [, bang, text, space, rawTarget] = match;

    let start = index + bang.length + 1 + text.length + 2 + space.length;
    let end = start + rawTarget.length;
    if (rawTarget.startsWith('<')) {
      start += 1;
      end -= 1;
    }

    const target = content.slice(start, end);
    if (target.trim() === '') continue;

    links.push({
      text: content.slice(index + bang.length + 1, index + bang.length + 1 + text.length),
      target,
      start,
      end,
      image: bang === '!',
    });
  }

  return links;
}

export function isMarkdownFile(name: string, extensions: string[]): boolean {
  const lower = name.toLowerCase();
  return extensions.some(ext => lower.endsWith(ext.toLowerCase()));
}

/**
 * URLs (`https:`, `mailto:`, `//host`) and in-page anchors are left alone.
 */
export function isExternalTarget(target: string): boolean {
  return SCHEME.test(target) || target.startsWith('//') || target.startsWith('#');
}

/**
 * `a/b.md?x#y` -> `{ path: 'a/b.md', suffix: '?x#y' }`
 */
export function splitTarget(target: string): { path: string; suffix: string } {
  const cut = target.search(/[?#]/);
  if (cut === -1) return { path: target, suffix: '' };
  return { path: target.slice(0, cut), suffix: target.slice(cut) };
}

export interface TargetReplacement {
  start: number;
  end: number;
  value: string;
}

export function replaceSpans(content: string, replacements: TargetReplacement[]): string {
  let result = content;
  for (const replacement of [...replacements].sort((a, b) => b.start - a.start)) {
    result = result.slice(0, replacement.start) + replacement.value + result.slice(replacement.end);
  }
  return result;
}
