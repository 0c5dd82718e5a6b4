import type {
  ColumnWriteClient,
  ColumnWriteResponse,
  RequestOptions,
  WriteRequest
} from '@series-import/import-core';
import { z } from 'zod';
import { SeriesClientError } from './errors';
import { HttpTransport } from './transport';
import type { ColumnWriteClientOptions } from './types';

export const DEFAULT_COLUMN_WRITE_PATH = '/write/columns';

const columnWriteResponseSchema = z.object({
  code: z.number().int(),
  message: z.string().optional()
});

// bigint timestamps and integer fields travel as decimal strings
function encodeBigints(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function serializeWriteRequest(request: WriteRequest): string {
  return JSON.stringify(request, encodeBigints);
}

export class ColumnWriteHttpClient implements ColumnWriteClient {
  private readonly transport: HttpTransport;
  private readonly path: string;

  constructor(options: ColumnWriteClientOptions) {
    this.transport = new HttpTransport(options);
    this.path = options.path ?? DEFAULT_COLUMN_WRITE_PATH;
  }

  async write(request: WriteRequest, options: RequestOptions = {}): Promise<ColumnWriteResponse> {
    const response = await this.transport.send({
      method: 'POST',
      path: this.path,
      body: serializeWriteRequest(request),
      contentType: 'application/json',
      signal: options.signal
    });

    const payload: unknown = await response.json();
    const parsed = columnWriteResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SeriesClientError('invalid column write response', {
        statusCode: response.status,
        code: 'INVALID_RESPONSE',
        details: parsed.error.issues
      });
    }
    return parsed.data;
  }
}
