export type SeriesClientErrorCode = 'ABORTED' | 'TIMEOUT' | 'QUERY_FAILED' | 'INVALID_RESPONSE' | 'HTTP_ERROR';

export class SeriesClientError extends Error {
  readonly statusCode: number;
  readonly code: SeriesClientErrorCode;
  readonly details: unknown;

  constructor(
    message: string,
    options: { statusCode: number; code: SeriesClientErrorCode; details?: unknown; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'SeriesClientError';
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.details = options.details;
  }
}
