import { Buffer } from 'node:buffer';
import { fetch, Headers } from 'undici';
import type { BodyInit, Response } from 'undici';
import { z } from 'zod';
import { SeriesClientError } from './errors';
import type { SeriesClientOptions } from './types';

export interface TransportRequest {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string | undefined>;
  body?: BodyInit;
  contentType?: string;
  signal?: AbortSignal;
  /** Status the endpoint answers with on success; any other 2xx is rejected. */
  expectStatus?: number;
}

const errorPayloadSchema = z.union([
  z.object({ error: z.string() }),
  z.object({ message: z.string() }).transform((payload) => ({ error: payload.message }))
]);

export function combineSignals(primary: AbortController, external?: AbortSignal): void {
  if (!external) {
    return;
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return;
  }
  external.addEventListener(
    'abort',
    () => {
      primary.abort(external.reason);
    },
    { once: true }
  );
}

function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Fetch wrapper shared by the series clients: auth, user agent, timeout and cancellation. */
export class HttpTransport {
  private readonly baseUrl: URL;
  private readonly authorization: string | null;
  private readonly defaultHeaders: Record<string, string>;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: SeriesClientOptions) {
    if (!options.baseUrl) {
      throw new Error('series client requires a baseUrl');
    }
    this.baseUrl = new URL(options.baseUrl);
    this.authorization = options.username
      ? `Basic ${Buffer.from(`${options.username}:${options.password ?? ''}`).toString('base64')}`
      : null;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  async send(request: TransportRequest): Promise<Response> {
    const headers = this.buildHeaders();
    if (request.contentType) {
      headers.set('Content-Type', request.contentType);
    }

    const controller = new AbortController();
    combineSignals(controller, request.signal);
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    try {
      const response = await fetch(this.buildUrl(request.path, request.query), {
        method: request.method,
        headers,
        body: request.body,
        signal: controller.signal
      });

      if (!response.ok) {
        await this.handleErrorResponse(response);
      }
      if (request.expectStatus !== undefined && response.status !== request.expectStatus) {
        throw new SeriesClientError(`unexpected status ${response.status} from ${request.path}`, {
          statusCode: response.status,
          code: 'HTTP_ERROR',
          details: await response.text().catch(() => null)
        });
      }
      return response;
    } catch (err) {
      if (controller.signal.aborted && !(err instanceof SeriesClientError)) {
        const timedOut = !request.signal?.aborted;
        throw new SeriesClientError(timedOut ? 'Request timed out' : 'Request aborted', {
          statusCode: 0,
          code: timedOut ? 'TIMEOUT' : 'ABORTED',
          details: err instanceof Error ? err.message : String(err),
          cause: err
        });
      }
      throw err;
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }
  }

  private buildHeaders(): Headers {
    const headers = new Headers({ Accept: 'application/json' });
    for (const [key, value] of Object.entries(this.defaultHeaders)) {
      headers.set(key, value);
    }
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    if (this.authorization) {
      headers.set('Authorization', this.authorization);
    }
    return headers;
  }

  private buildUrl(path: string, query?: Record<string, string | undefined>): URL {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined || value === '') {
          continue;
        }
        url.searchParams.set(key, value);
      }
    }
    return url;
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const text = await response.text().catch(() => '');
    const payload = parseJsonText(text);
    const parsed = errorPayloadSchema.safeParse(payload);
    if (parsed.success) {
      throw new SeriesClientError(parsed.data.error, {
        statusCode: response.status,
        code: 'HTTP_ERROR',
        details: payload
      });
    }

    throw new SeriesClientError(response.statusText || 'series request failed', {
      statusCode: response.status,
      code: 'HTTP_ERROR',
      details: payload
    });
  }
}
