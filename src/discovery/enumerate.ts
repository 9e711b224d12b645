/**
 * Filesystem enumeration by glob pattern
 */

import fg from 'fast-glob';

/** Returns the existing paths matching a glob pattern */
export type PathEnumerator = (pattern: string) => string[];

export interface EnumerateOptions {
  /** Base directory for relative patterns (default: process.cwd()) */
  cwd?: string;
}

/** Characters that keep their glob meaning in template literal text */
const LITERAL_MAGIC = /([*?[\]])/;

/**
 * Escape template literal text for fast-glob.
 * `*`, `?` and `[...]` stay special; braces, parentheses, extglob prefixes,
 * a leading `!` and backslashes match themselves.
 */
export function escapeGlobLiteral(text: string): string {
  return text
    .split(LITERAL_MAGIC)
    .map((part, i) => (i % 2 === 1 ? part : fg.escapePath(part)))
    .join('');
}

/**
 * Plain code-unit ordering, so row order never depends on locale
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * List files and directories matching a glob pattern, sorted.
 * `*` stays within one path segment; dot-entries only match literally.
 */
export function enumeratePaths(pattern: string, options: EnumerateOptions = {}): string[] {
  const entries = fg.sync(pattern, {
    cwd: options.cwd,
    onlyFiles: false,
    dot: false,
    unique: true,
  });
  return [...entries].sort(comparePaths);
}

/**
 * Bind enumeratePaths to a base directory
 */
export function createFsEnumerator(options: EnumerateOptions = {}): PathEnumerator {
  return (pattern) => enumeratePaths(pattern, options);
}
