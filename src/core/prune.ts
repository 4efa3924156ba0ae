import fs from 'fs';
import path from 'path';
import { loadConfig, resolveConfigPath } from './config';
import { describeCause, InputError } from './errors';
import { filterReport } from './filter';
import { parseLcov } from './lcov/parse';
import { renderLcov } from './lcov/render';
import { logger } from './logger';
import { buildTestIndex } from './test-index';
import { PruneConfig, RemovedFunction } from './types';

export interface PruneOptions {
  /** Project source root; test discovery and relative paths start here. */
  cwd: string;
  /** Overrides the config file lookup. */
  config?: PruneConfig;
}

export interface PruneResult {
  output: string;
  removed: RemovedFunction[];
  retained: number;
  /** Directories skipped while looking for unit tests. */
  unreadable: readonly string[];
  /** Sections whose FNL/FNA function data was left in place. */
  unfilteredFunctionData: string[];
}

/**
 * Read a coverage file as UTF-8 text, byte order mark included. Missing
 * files, directories and bytes that are not UTF-8 all raise InputError.
 */
export function readCoverageFile(filePath: string): string {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (err) {
    throw new InputError(`Cannot read coverage file ${filePath}: ${describeCause(err)}`);
  }
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
  } catch {
    throw new InputError(`Coverage file ${filePath} is not valid UTF-8 text`);
  }
}

export function pruneCoverage(content: string, config: PruneConfig, cwd: string): PruneResult {
  const report = parseLcov(content);
  const index = buildTestIndex(cwd, {
    testGlobs: config.test_globs,
    ignoreGlobs: config.ignore_globs,
    aliases: config.tested_aliases,
    delegates: config.delegate_prefixes,
    onError: config.lookup_errors,
  });
  const result = filterReport(report, {
    index,
    libraryDir: config.library_dir,
    cwd,
    recountSummaries: config.recount_summaries,
  });

  return {
    output: renderLcov(result.report),
    removed: result.removed,
    retained: result.retained,
    unreadable: index.unreadable,
    unfilteredFunctionData: result.unfilteredFunctionData,
  };
}

/**
 * Filter one LCOV file: the whole pipeline behind the CLI. Throws a
 * PruneError subclass on failure and produces no output in that case.
 */
export function pruneCoverageFile(filePath: string, options: PruneOptions): PruneResult {
  const inputPath = path.resolve(options.cwd, filePath);
  const config = options.config ?? loadConfig(resolveConfigPath(options.cwd));
  const content = readCoverageFile(inputPath);
  logger.debug('prune', 'read coverage file', { inputPath, bytes: content.length });
  return pruneCoverage(content, config, options.cwd);
}
