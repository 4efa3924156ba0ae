import fs from 'fs';
import path from 'path';
import picomatch from 'picomatch';
import { describeCause, LookupError } from './errors';
import { logger } from './logger';
import { normalizePathForMatch } from './classify';
import { DelegatePrefix, LookupErrorPolicy, TestIndex } from './types';

export interface TestIndexOptions {
  testGlobs: string[];
  ignoreGlobs: string[];
  aliases?: string[];
  delegates?: DelegatePrefix[];
  onError?: LookupErrorPolicy;
}

const TEST_SUFFIX = /_test\.[^.]+$/;

/** `foo_test.c` -> `foo`; undefined when the name does not follow the convention. */
export function functionNameFromTestFile(fileName: string): string | undefined {
  if (!TEST_SUFFIX.test(fileName)) return undefined;
  const name = fileName.replace(TEST_SUFFIX, '');
  return name || undefined;
}

function compile(globs: string[]): (candidate: string) => boolean {
  if (!globs.length) return () => false;
  const matchers = globs.map((glob) => picomatch(normalizePathForMatch(glob), { dot: true }));
  return (candidate) => matchers.some((matcher) => matcher(candidate));
}

/**
 * Scan `root` once for unit-test sources and collect the function names they
 * are named after.
 *
 * Symbolic links are never followed into. With `onError: 'skip'` an
 * unreadable directory contributes no names; with `'fail'` it aborts the scan.
 */
export function buildTestIndex(root: string, options: TestIndexOptions): TestIndex {
  const isTestFile = compile(options.testGlobs);
  const isIgnored = compile(options.ignoreGlobs);
  const names = new Set<string>(options.aliases ?? []);
  const unreadable: string[] = [];
  const pending: string[] = [''];

  while (pending.length) {
    const rel = pending.pop() ?? '';
    const abs = rel ? path.join(root, rel) : root;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(abs, { withFileTypes: true });
    } catch (err) {
      if (options.onError === 'fail') {
        throw new LookupError(abs, err);
      }
      logger.warn('test-index', 'skipping unreadable directory', { dir: abs, error: describeCause(err) });
      unreadable.push(rel || '.');
      continue;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const entryRel = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (!isIgnored(entryRel)) pending.push(entryRel);
        continue;
      }
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      if (!isTestFile(entryRel)) continue;
      const name = functionNameFromTestFile(entry.name);
      if (name) names.add(name);
    }
  }

  logger.debug('test-index', 'indexed unit tests', { root, count: names.size, unreadable: unreadable.length });
  return { names, delegates: options.delegates ?? [], unreadable };
}

/**
 * Whether a unit test exists for `name`, directly or through a delegate
 * prefix (`api__foo` counts as tested when `api_foo` is).
 */
export function testExists(index: TestIndex, name: string): boolean {
  if (index.names.has(name)) return true;
  return index.delegates.some(
    (delegate) =>
      delegate.from !== '' &&
      name.startsWith(delegate.from) &&
      index.names.has(delegate.to + name.slice(delegate.from.length)),
  );
}
