import { performance } from 'node:perf_hooks';
import type { Precision, QueryClient, RequestOptions, RowWriteClient } from '@series-import/import-core';
import { z } from 'zod';
import { SeriesClientError } from './errors';
import { HttpTransport } from './transport';
import type { PingResult, QueryResponse, SeriesClientOptions } from './types';

export interface QueryOptions extends RequestOptions {
  database?: string;
  retentionPolicy?: string;
}

const queryResponseSchema = z.object({
  results: z
    .array(
      z
        .object({
          statement_id: z.number().optional(),
          error: z.string().optional(),
          series: z.array(z.unknown()).optional()
        })
        .passthrough()
    )
    .default([]),
  error: z.string().optional()
});

/**
 * HTTP client for the query and row-write endpoints. Implements the
 * collaborator interfaces the importer drives.
 */
export class SeriesHttpClient implements QueryClient, RowWriteClient {
  private readonly transport: HttpTransport;

  constructor(options: SeriesClientOptions) {
    this.transport = new HttpTransport(options);
  }

  async query(command: string, options: QueryOptions = {}): Promise<QueryResponse> {
    const form = new URLSearchParams({ q: command });
    if (options.database) {
      form.set('db', options.database);
    }
    if (options.retentionPolicy) {
      form.set('rp', options.retentionPolicy);
    }

    const response = await this.transport.send({
      method: 'POST',
      path: '/query',
      body: form.toString(),
      contentType: 'application/x-www-form-urlencoded',
      signal: options.signal
    });

    const payload: unknown = await response.json();
    const parsed = queryResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SeriesClientError('invalid query response', {
        statusCode: response.status,
        code: 'INVALID_RESPONSE',
        details: parsed.error.issues
      });
    }

    const failure = parsed.data.error ?? parsed.data.results.find((result) => result.error)?.error;
    if (failure) {
      throw new SeriesClientError(failure, { statusCode: response.status, code: 'QUERY_FAILED', details: payload });
    }
    return parsed.data;
  }

  async write(
    database: string,
    retentionPolicy: string,
    lines: string,
    precision: Precision,
    options: RequestOptions = {}
  ): Promise<void> {
    await this.transport.send({
      method: 'POST',
      path: '/write',
      query: { db: database, rp: retentionPolicy, precision },
      body: lines,
      contentType: 'text/plain; charset=utf-8',
      signal: options.signal,
      expectStatus: 204
    });
  }

  async ping(options: RequestOptions = {}): Promise<PingResult> {
    const startedAt = performance.now();
    const response = await this.transport.send({
      method: 'GET',
      path: '/ping',
      signal: options.signal,
      expectStatus: 204
    });
    return {
      version: response.headers.get('x-influxdb-version'),
      durationMs: Math.round(performance.now() - startedAt)
    };
  }
}
