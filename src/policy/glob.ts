/**
 * Glob patterns for excluded names and search filters.
 *
 *   *    any run of characters except "/"
 *   **   any run of characters, "/" included
 *   ?    one character except "/"
 *   [ab] [a-z] [!ab]   character classes
 */

export interface GlobMatcher {
  readonly pattern: string;
  /** True when the pattern names a path (contains "/") rather than a single segment. */
  readonly anchored: boolean;
  test(value: string): boolean;
}

export class GlobSyntaxError extends Error {
  constructor(public readonly pattern: string, detail: string) {
    super(`Invalid pattern "${pattern}": ${detail}`);
    this.name = 'GlobSyntaxError';
  }
}

export function compileGlob(pattern: string): GlobMatcher {
  if (pattern.length === 0) {
    throw new GlobSyntaxError(pattern, 'pattern is empty');
  }

  let regexStr = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];

    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        // "**/" also matches zero directories
        if (pattern[i + 2] === '/') {
          regexStr += '(?:.*/)?';
          i += 2;
        } else {
          regexStr += '.*';
          i += 1;
        }
      } else {
        regexStr += '[^/]*';
      }
      continue;
    }

    if (ch === '?') {
      regexStr += '[^/]';
      continue;
    }

    if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        throw new GlobSyntaxError(pattern, `unterminated character class at position ${i + 1}`);
      }
      let body = pattern.slice(i + 1, close);
      const negated = body.startsWith('!');
      if (negated) body = body.slice(1);
      if (body.length === 0) {
        throw new GlobSyntaxError(pattern, `empty character class at position ${i + 1}`);
      }
      regexStr += `[${negated ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
      i = close;
      continue;
    }

    regexStr += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }

  let regex: RegExp;
  try {
    regex = new RegExp(`^${regexStr}$`);
  } catch (err) {
    throw new GlobSyntaxError(pattern, (err as Error).message);
  }

  return {
    pattern,
    anchored: pattern.includes('/'),
    test: (value: string) => regex.test(value),
  };
}

export function globMatch(value: string, pattern: string): boolean {
  if (pattern === '*') return !value.includes('/');
  return compileGlob(pattern).test(value);
}
