export interface SeriesClientOptions {
  baseUrl: string;
  username?: string;
  password?: string;
  defaultHeaders?: Record<string, string>;
  userAgent?: string;
  fetchTimeoutMs?: number;
}

export interface ColumnWriteClientOptions extends SeriesClientOptions {
  /** Defaults to `/write/columns`. */
  path?: string;
}

export interface PingResult {
  version: string | null;
  durationMs: number;
}

export interface QueryStatementResult {
  statement_id?: number;
  error?: string;
  series?: unknown[];
}

export interface QueryResponse {
  results: QueryStatementResult[];
  error?: string;
}
