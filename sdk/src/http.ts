/**
 * Transport for the Groundwork API
 *
 * `request` reads one JSON document. `stream` yields each line of an
 * NDJSON body as it arrives. Both join the caller's signal with the
 * client timeout; for a stream the timeout covers the whole body.
 */

import { GroundworkServerError, errorFromEnvelope, type RateLimitInfo } from './errors.js';
import type { GroundworkClientConfig } from './types.js';

type QueryValue = string | number | boolean | undefined;

export interface HttpRequestOptions {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
  /** Non-2xx statuses whose JSON body is returned instead of thrown */
  acceptStatuses?: number[];
}

const DEFAULT_TIMEOUT_MS = 60_000;

export class GroundworkHttpClient {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly headers: Headers;
  private readonly timeoutMs: number;

  constructor(config: GroundworkClientConfig) {
    this.baseUrl = config.baseUrl.trim().replace(/\/+$/, '');
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    this.headers = new Headers(config.defaultHeaders);
    if (!this.headers.has('authorization')) {
      this.headers.set('authorization', `Bearer ${config.token}`);
    }
  }

  async request<T>(options: HttpRequestOptions): Promise<T> {
    const call = new Call(this.timeoutMs, options.signal);
    try {
      const response = await this.send(options, call.signal, 'application/json');
      const body = parseJson(await response.text());
      const accepted = response.ok || (options.acceptStatuses ?? []).includes(response.status);
      if (!accepted) {
        throw errorFromEnvelope(response.status, body, responseMeta(response));
      }
      if (body === undefined) {
        throw new GroundworkServerError('Groundwork API returned a non-JSON body', {
          status: response.status,
          code: 'INVALID_RESPONSE',
          ...responseMeta(response),
        });
      }
      return body as T;
    } catch (error) {
      throw call.translate(error);
    } finally {
      call.end();
    }
  }

  /**
   * Parsed NDJSON lines in arrival order. Leaving the loop early cancels
   * the underlying request.
   */
  async *stream<T>(options: HttpRequestOptions): AsyncGenerator<T, void, undefined> {
    const call = new Call(this.timeoutMs, options.signal);
    try {
      const response = await this.send(options, call.signal, 'application/x-ndjson');
      if (!response.ok) {
        throw errorFromEnvelope(response.status, parseJson(await response.text()), responseMeta(response));
      }
      if (!response.body) {
        throw new GroundworkServerError('Groundwork API returned an empty stream', {
          status: response.status,
          code: 'INVALID_RESPONSE',
          ...responseMeta(response),
        });
      }

      for await (const line of readLines(response.body)) {
        const parsed = parseJson(line);
        if (parsed === undefined) {
          throw new GroundworkServerError('Groundwork API sent a malformed stream line', {
            status: response.status,
            code: 'INVALID_RESPONSE',
            details: { line },
          });
        }
        yield parsed as T;
      }
    } catch (error) {
      throw call.translate(error);
    } finally {
      call.end();
    }
  }

  private send(options: HttpRequestOptions, signal: AbortSignal, accept: string): Promise<Response> {
    const url = new URL(`${this.baseUrl}${options.path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    const headers = new Headers(this.headers);
    headers.set('accept', accept);
    if (options.body !== undefined && !headers.has('content-type')) {
      headers.set('content-type', 'application/json');
    }

    return this.fetchFn(url.toString(), {
      method: options.method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal,
    });
  }
}

/**
 * Abort wiring for one call: the caller's signal and the timeout both
 * abort the same controller.
 */
class Call {
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private timedOut = false;

  constructor(
    private readonly timeoutMs: number,
    private readonly callerSignal?: AbortSignal,
  ) {
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);

    if (callerSignal?.aborted) {
      this.controller.abort();
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  translate(error: unknown): unknown {
    if (!(error instanceof Error) || error.name !== 'AbortError') return error;
    return new GroundworkServerError(
      this.timedOut ? `Request timed out after ${this.timeoutMs}ms` : 'Request was aborted',
      { status: 408, code: this.timedOut ? 'TIMEOUT' : 'ABORTED' },
    );
  }

  /** Also drops a body the consumer stopped reading */
  end(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
    this.controller.abort();
  }

  private readonly onCallerAbort = () => this.controller.abort();
}

async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = '';
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffered += decoder.decode(value, { stream: true });

      let newline = buffered.indexOf('\n');
      while (newline !== -1) {
        const line = buffered.slice(0, newline).trim();
        buffered = buffered.slice(newline + 1);
        if (line) yield line;
        newline = buffered.indexOf('\n');
      }
    }
    const rest = (buffered + decoder.decode()).trim();
    if (rest) yield rest;
  } finally {
    reader.releaseLock();
  }
}

function responseMeta(response: Response): { headers: Record<string, string>; rateLimit?: RateLimitInfo } {
  const headers = Object.fromEntries(response.headers.entries());
  const rateLimit: RateLimitInfo = {
    limit: headerNumber(response.headers, 'x-ratelimit-limit'),
    remaining: headerNumber(response.headers, 'x-ratelimit-remaining'),
    reset: headerNumber(response.headers, 'x-ratelimit-reset'),
    retryAfter: headerNumber(response.headers, 'retry-after'),
  };
  const anyRateLimit = Object.values(rateLimit).some((value) => value !== undefined);
  return anyRateLimit ? { headers, rateLimit } : { headers };
}

function headerNumber(headers: Headers, name: string): number | undefined {
  const raw = headers.get(name)?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
