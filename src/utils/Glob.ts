/**
 * Shell-style wildcard matching used by filter expressions.
 *
 * Supported syntax:
 * - `*` any run of characters (including `/`)
 * - `?` exactly one character
 * - `[abc]`, `[a-z]`, `[!abc]` / `[^abc]` character classes
 * - `\x` the literal character `x`
 *
 * Everything else matches literally. An unterminated `[` is taken literally.
 */

const cache = new Map<string, RegExp>();

export function globToRegExp(pattern: string): RegExp {
  const cached = cache.get(pattern);
  if (cached) return cached;

  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '\\' && i + 1 < pattern.length) {
      i++;
      source += escapeRegExp(pattern[i]);
    } else if (ch === '[') {
      const end = findClassEnd(pattern, i);
      if (end === -1) {
        source += '\\[';
        continue;
      }
      source += translateClass(pattern.slice(i + 1, end));
      i = end;
    } else {
      source += escapeRegExp(ch);
    }
  }

  const regex = new RegExp(`^${source}$`, 's');
  cache.set(pattern, regex);
  return regex;
}

export function globMatch(value: string, pattern: string): boolean {
  return globToRegExp(pattern).test(value);
}

function findClassEnd(pattern: string, start: number): number {
  let i = start + 1;
  if (pattern[i] === '!' || pattern[i] === '^') i++;
  // a leading `]` is part of the class
  if (pattern[i] === ']') i++;
  for (; i < pattern.length; i++) {
    if (pattern[i] === ']') return i;
  }
  return -1;
}

function translateClass(body: string): string {
  let negate = false;
  if (body.startsWith('!') || body.startsWith('^')) {
    negate = true;
    body = body.slice(1);
  }
  const escaped = body.replace(/[\\\]^[]/g, '\\$&');
  return `[${negate ? '^' : ''}${escaped}]`;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}
