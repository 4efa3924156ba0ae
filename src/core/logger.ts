/** Stderr logger, silent unless LCOV_PRUNE_DEBUG is set. */

const ENABLED = !!process.env.LCOV_PRUNE_DEBUG;

type Level = 'DEBUG' | 'WARN';

function write(level: Level, component: string, message: string, extra?: Record<string, unknown>): void {
  if (!ENABLED) return;
  let line = `${new Date().toISOString()} ${level} ${component}: ${message}`;
  if (extra) line += ` ${JSON.stringify(extra)}`;
  process.stderr.write(`${line}\n`);
}

export const logger = {
  debug(component: string, message: string, extra?: Record<string, unknown>): void {
    write('DEBUG', component, message, extra);
  },
  warn(component: string, message: string, extra?: Record<string, unknown>): void {
    write('WARN', component, message, extra);
  },
};
