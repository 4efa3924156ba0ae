import fs from 'fs';
import path from 'path';
import yaml from 'yaml';
import { ConfigError, describeCause } from './errors';
import { logger } from './logger';
import { safeParsePruneConfig } from './schema';
import { PruneConfig } from './types';

export const CONFIG_DIR = '.lcov-prune';

export function resolveConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_DIR, 'config.yaml');
}

export function defaultConfig(): PruneConfig {
  return {
    version: 1,
    library_dir: 'lib',
    test_globs: ['**/*_test.c'],
    ignore_globs: ['**/.git', '**/node_modules'],
    tested_aliases: [],
    delegate_prefixes: [],
    lookup_errors: 'skip',
    recount_summaries: false,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the config file, if any, over the defaults. A missing file gives the
 * defaults; a file that does not parse or validate is a ConfigError.
 */
export function loadConfig(configPath: string | undefined): PruneConfig {
  if (!configPath || !fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read config ${configPath}: ${describeCause(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = yaml.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${describeCause(err)}`);
  }

  if (parsed === null || parsed === undefined) {
    return defaultConfig();
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid config at ${configPath}: expected a mapping at the top level`);
  }

  const validation = safeParsePruneConfig({ ...defaultConfig(), ...parsed });
  if (!validation.success) {
    throw new ConfigError(`Invalid config at ${configPath}:\n  ${validation.errors.join('\n  ')}`);
  }

  logger.debug('config', 'loaded config', { configPath });
  return validation.data;
}
