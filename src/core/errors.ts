export type PruneErrorCode = 'E_INPUT' | 'E_PARSE' | 'E_CONFIG' | 'E_LOOKUP';

export class PruneError extends Error {
  readonly code: PruneErrorCode;

  constructor(code: PruneErrorCode, message: string) {
    super(message);
    this.name = 'PruneError';
    this.code = code;
  }
}

/** The coverage file is missing, unreadable or not UTF-8 text. */
export class InputError extends PruneError {
  constructor(message: string) {
    super('E_INPUT', message);
    this.name = 'InputError';
  }
}

export class ParseError extends PruneError {
  readonly line: number;
  readonly content: string;

  constructor(line: number, reason: string, content: string) {
    super('E_PARSE', `line ${line}: ${reason}: ${content}`);
    this.name = 'ParseError';
    this.line = line;
    this.content = content;
  }
}

export class ConfigError extends PruneError {
  constructor(message: string) {
    super('E_CONFIG', message);
    this.name = 'ConfigError';
  }
}

export class LookupError extends PruneError {
  readonly dir: string;

  constructor(dir: string, cause: unknown) {
    super('E_LOOKUP', `Cannot scan ${dir} for unit tests: ${describeCause(cause)}`);
    this.name = 'LookupError';
    this.dir = dir;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
