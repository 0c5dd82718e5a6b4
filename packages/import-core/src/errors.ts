export class LineProtocolParseError extends Error {
  readonly line: string | null;

  constructor(message: string, line: string | null = null) {
    super(message);
    this.name = 'LineProtocolParseError';
    this.line = line;
  }
}

export class ImportConfigurationError extends Error {
  readonly fatal: boolean;

  constructor(message: string, options: { fatal?: boolean } = {}) {
    super(message);
    this.name = 'ImportConfigurationError';
    this.fatal = options.fatal ?? false;
  }
}

export class DatabaseRequiredError extends ImportConfigurationError {
  constructor(hint = 'make sure `# CONTEXT-DATABASE:` token is exist') {
    super(`database is required, ${hint}`);
    this.name = 'DatabaseRequiredError';
  }
}

export const STRUCTURED_DATABASE_HINT = 'specify it with `--database`';

export class RecordDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordDecodeError';
  }
}

export class WriteRequestBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WriteRequestBuildError';
  }
}

export class WriteResponseError extends Error {
  readonly code: number;
  readonly responseMessage: string | null;

  constructor(message: string, code: number, responseMessage?: string | null) {
    super(message);
    this.name = 'WriteResponseError';
    this.code = code;
    this.responseMessage = responseMessage ?? null;
  }
}

export class ImportAbortedError extends Error {
  constructor(message = 'import aborted', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImportAbortedError';
  }
}

export class FlushError extends AggregateError {
  constructor(errors: Error[]) {
    super(errors, errors.map((error) => error.message).join('\n'));
    this.name = 'FlushError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function isFatalImportError(err: unknown): boolean {
  return err instanceof ImportAbortedError || (err instanceof ImportConfigurationError && err.fatal);
}

/** Failures that repeat on every attempt, so their batch is not retried. */
export function isPermanentWriteError(err: unknown): boolean {
  return (
    err instanceof WriteRequestBuildError || err instanceof LineProtocolParseError || err instanceof RecordDecodeError
  );
}

export function isAbortError(err: unknown): boolean {
  return err instanceof ImportAbortedError || (err instanceof Error && err.name === 'AbortError');
}
