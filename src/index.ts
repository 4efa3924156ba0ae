export * from './core/types';
export * from './core/errors';
export { parseLcov, classifyLine, TRANSITIONS } from './core/lcov/parse';
export type { ParserState, ParserAction, LineClass } from './core/lcov/parse';
export { renderLcov } from './core/lcov/render';
export { functionRanges, functionsInSection, ownersOf } from './core/lcov/functions';
export { isStaticPath } from './core/classify';
export { buildTestIndex, testExists, functionNameFromTestFile } from './core/test-index';
export type { TestIndexOptions } from './core/test-index';
export { filterReport } from './core/filter';
export type { FilterOptions } from './core/filter';
export { defaultConfig, loadConfig, resolveConfigPath } from './core/config';
export { pruneCoverage, pruneCoverageFile, readCoverageFile } from './core/prune';
export type { PruneOptions, PruneResult } from './core/prune';
