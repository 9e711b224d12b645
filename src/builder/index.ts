export type { BuildOptions } from './build.js';
export { buildParamTable, describeMatches } from './build.js';
