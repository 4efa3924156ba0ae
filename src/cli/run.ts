import fs from 'fs';
import path from 'path';
import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { PruneError } from '../core/errors';
import { pruneCoverageFile } from '../core/prune';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
}

const packageJsonPath = path.resolve(__dirname, '..', '..', 'package.json');
const packageJson: { version: string } = fs.existsSync(packageJsonPath)
  ? JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'))
  : { version: '0.0.0' };

function formatError(err: unknown): string {
  if (err instanceof PruneError) return `${err.name}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

function buildProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  return new Command()
    .name('lcov-prune')
    .description('Remove LCOV coverage of functions that have no unit test. Run from the project source root.')
    .version(packageJson.version)
    .argument('<coverage_file>', 'LCOV tracefile to filter')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action((coverageFile: string) => {
      try {
        const result = pruneCoverageFile(coverageFile, { cwd: io.cwd });
        for (const dir of result.unreadable) {
          io.stderr(chalk.yellow(`Warning: could not scan ${dir} for unit tests; its tests were not counted.`) + '\n');
        }
        for (const sourcePath of result.unfilteredFunctionData) {
          io.stderr(chalk.yellow(`Warning: FNL/FNA function data in ${sourcePath} was not filtered.`) + '\n');
        }
        io.stdout(result.output);
        setExitCode(0);
      } catch (err) {
        io.stderr(chalk.red(formatError(err)) + '\n');
        setExitCode(1);
      }
    });
}

/**
 * Run the CLI over `argv` (user arguments only, no node/script prefix) and
 * return the exit code. The report goes to `io.stdout` only on success.
 */
export function run(argv: string[], io: CliIO): number {
  let exitCode = 0;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
