/**
 * End-to-end tests for the pipeline behind the CLI: read the file, scan the
 * working directory for unit tests, filter, render.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { pruneCoverageFile, readCoverageFile } from '../src/core/prune';
import { defaultConfig, resolveConfigPath } from '../src/core/config';
import { ConfigError, InputError, ParseError } from '../src/core/errors';

const SCENARIO = [
  'TN:',
  'SF:lib/foo.c',
  'FN:3,helper_fn',
  'FNDA:2,helper_fn',
  'FNF:1',
  'FNH:1',
  'DA:3,2',
  'DA:4,2',
  'LF:2',
  'LH:2',
  'end_of_record',
  'TN:',
  'SF:lib/bar.c',
  'FN:10,public_api_fn',
  'FNDA:1,public_api_fn',
  'FNF:1',
  'FNH:1',
  'DA:10,1',
  'DA:11,1',
  'LF:2',
  'LH:2',
  'end_of_record',
  'TN:',
  'SF:src/main.c',
  'FN:5,parse_args',
  'FNDA:4,parse_args',
  'FNF:1',
  'FNH:1',
  'DA:5,4',
  'DA:6,4',
  'DA:7,0',
  'LF:3',
  'LH:2',
  'end_of_record',
  '',
].join('\n');

const SCENARIO_FILTERED = [
  'TN:',
  'SF:lib/foo.c',
  'FN:3,helper_fn',
  'FNDA:2,helper_fn',
  'FNF:1',
  'FNH:1',
  'DA:3,2',
  'DA:4,2',
  'LF:2',
  'LH:2',
  'end_of_record',
  'TN:',
  'SF:lib/bar.c',
  'FN:10,public_api_fn',
  'FNDA:1,public_api_fn',
  'FNF:1',
  'FNH:1',
  'DA:10,1',
  'DA:11,1',
  'LF:2',
  'LH:2',
  'end_of_record',
  'TN:',
  'SF:src/main.c',
  'FNF:1',
  'FNH:1',
  'LF:3',
  'LH:2',
  'end_of_record',
  '',
].join('\n');

function touch(root: string, rel: string, content = ''): string {
  const abs = path.join(root, rel);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content);
  return abs;
}

describe('pruneCoverageFile', () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'lcov-prune-e2e-'));
    touch(workspace, 'lib/tests/public_api_fn_test.c');
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('drops untested functions outside the library directory', () => {
    touch(workspace, 'coverage.info', SCENARIO);
    const result = pruneCoverageFile('coverage.info', { cwd: workspace });

    expect(result.output).toBe(SCENARIO_FILTERED);
    expect(result.removed).toEqual([{ path: 'src/main.c', name: 'parse_args', start: 5 }]);
    expect(result.retained).toBe(2);
    expect(result.unreadable).toEqual([]);
  });

  it('keeps a function once its test file appears', () => {
    touch(workspace, 'src/tests/parse_args_test.c');
    touch(workspace, 'coverage.info', SCENARIO);
    expect(pruneCoverageFile('coverage.info', { cwd: workspace }).output).toBe(SCENARIO);
  });

  it('classifies absolute source paths against the working directory', () => {
    const absolute = SCENARIO.split('SF:').join(`SF:${workspace}/`);
    touch(workspace, 'coverage.info', absolute);
    const result = pruneCoverageFile('coverage.info', { cwd: workspace });
    expect(result.removed.map((fn) => fn.name)).toEqual(['parse_args']);
  });

  it('produces empty output for an empty report', () => {
    touch(workspace, 'coverage.info', '');
    const result = pruneCoverageFile('coverage.info', { cwd: workspace });
    expect(result.output).toBe('');
    expect(result.removed).toEqual([]);
  });

  it('reads settings from .lcov-prune/config.yaml', () => {
    touch(workspace, path.relative(workspace, resolveConfigPath(workspace)), 'library_dir: src\n');
    touch(workspace, 'coverage.info', SCENARIO);
    const result = pruneCoverageFile('coverage.info', { cwd: workspace });
    expect(result.removed.map((fn) => `${fn.path}:${fn.name}`)).toEqual(['lib/foo.c:helper_fn']);
  });

  it('prefers an explicit config over the config file', () => {
    touch(workspace, path.relative(workspace, resolveConfigPath(workspace)), 'library_dir: 7\n');
    touch(workspace, 'coverage.info', SCENARIO);
    const result = pruneCoverageFile('coverage.info', {
      cwd: workspace,
      config: { ...defaultConfig(), tested_aliases: ['parse_args'] },
    });
    expect(result.output).toBe(SCENARIO);
  });

  it('fails on an invalid config file before touching the report', () => {
    touch(workspace, path.relative(workspace, resolveConfigPath(workspace)), 'library_dir: 7\n');
    expect(() => pruneCoverageFile('missing.info', { cwd: workspace })).toThrow(ConfigError);
  });

  it('reports a missing file as an input error', () => {
    expect(() => pruneCoverageFile('missing.info', { cwd: workspace })).toThrow(InputError);
  });

  it('reports a directory as an input error', () => {
    expect(() => pruneCoverageFile('lib', { cwd: workspace })).toThrow(InputError);
  });

  it('rejects bytes that are not UTF-8', () => {
    const file = path.join(workspace, 'binary.info');
    fs.writeFileSync(file, Buffer.from([0x53, 0x46, 0x3a, 0xff, 0xfe]));
    expect(() => readCoverageFile(file)).toThrow(`Coverage file ${file} is not valid UTF-8 text`);
  });

  it('keeps a leading byte order mark in the output', () => {
    const withBom = '\ufeffTN:\nSF:lib/a.c\nFN:1,a\nDA:1,1\nend_of_record\n';
    touch(workspace, 'bom.info', withBom);
    expect(pruneCoverageFile('bom.info', { cwd: workspace }).output).toBe(withBom);
  });

  it('lists sections with FNL/FNA function data', () => {
    touch(workspace, 'indexed.info', 'SF:lib/a.c\nFNL:0,1,4\nFNA:0,1,a\nDA:1,1\nend_of_record\n');
    expect(pruneCoverageFile('indexed.info', { cwd: workspace }).unfilteredFunctionData).toEqual(['lib/a.c']);
  });

  it('reports structural problems as parse errors', () => {
    touch(workspace, 'broken.info', 'SF:src/main.c\nFN:5,parse_args\n');
    expect(() => pruneCoverageFile('broken.info', { cwd: workspace })).toThrow(ParseError);
  });
});
