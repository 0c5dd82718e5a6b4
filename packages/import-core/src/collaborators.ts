import type { WriteRequest } from './dispatch/writeRequest';
import type { Precision } from './types';

export type RequestOptions = {
  signal?: AbortSignal;
};

export interface QueryClient {
  query(command: string, options?: RequestOptions): Promise<unknown>;
}

export interface RowWriteClient {
  write(
    database: string,
    retentionPolicy: string,
    lines: string,
    precision: Precision,
    options?: RequestOptions
  ): Promise<void>;
}

export type ColumnWriteResponse = {
  code: number;
  message?: string;
};

export interface ColumnWriteClient {
  write(request: WriteRequest, options?: RequestOptions): Promise<ColumnWriteResponse>;
}
