export type { PathEnumerator, EnumerateOptions } from './enumerate.js';
export { enumeratePaths, createFsEnumerator, comparePaths, escapeGlobLiteral } from './enumerate.js';
