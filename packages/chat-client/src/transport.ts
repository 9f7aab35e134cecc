/**
 * HTTP transport for the chat service.
 *
 * A Transport performs one call and returns the decoded JSON body, or throws
 * one of the network errors from @relaybot/core:
 *
 * - NetworkTransientError: connection failure, timeout, HTTP 429 or 5xx
 * - NetworkFatalError: authentication failure, undecodable body, other 4xx
 * - ChatApiError: a well-formed `{"result": "error"}` answer
 *
 * Aborting the caller's signal rejects with an AbortError untouched.
 */
import {
  ChatApiError,
  NetworkFatalError,
  NetworkTransientError,
  abortError,
  formatError,
  logger,
} from '@relaybot/core';
import { errorResponseSchema } from './schemas.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export type ParamValue = string | number | boolean | readonly unknown[] | Record<string, unknown>;

export interface TransportRequest {
  method: HttpMethod;
  /** Path below the API root, e.g. `/register`. */
  path: string;
  params?: Record<string, ParamValue | undefined>;
  signal?: AbortSignal;
  /** Overrides the transport's default timeout for this call. */
  timeoutMs?: number;
}

export interface Transport {
  request(req: TransportRequest): Promise<unknown>;
}

export interface FetchTransportOptions {
  /** Server base URL, e.g. `https://chat.example.com`. */
  site: string;
  email: string;
  apiKey: string;
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

const API_PREFIX = '/api/v1';

/**
 * Encode one parameter the way the API expects form fields:
 * strings as-is, everything structured as JSON.
 */
export function encodeParam(value: ParamValue): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export function encodeParams(params: TransportRequest['params']): URLSearchParams {
  const search = new URLSearchParams();
  if (!params) return search;
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, encodeParam(value));
  }
  return search;
}

function parseRetryAfter(header: string | null, body: unknown): number | undefined {
  const parsed = errorResponseSchema.safeParse(body);
  if (parsed.success && parsed.data['retry-after'] !== undefined) {
    return Math.ceil(parsed.data['retry-after'] * 1000);
  }
  if (header) {
    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.ceil(seconds * 1000);
  }
  return undefined;
}

/**
 * Read the whole body as text. Aborting `signal` cancels the read, so the
 * request timeout also covers a body that stalls after the headers.
 */
async function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (!response.body) return '';
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  const onAbort = () => {
    reader.cancel().catch((err: unknown) => {
      logger.debug({ err: formatError(err) }, 'Cancelling response body failed');
    });
  };
  signal.addEventListener('abort', onAbort, { once: true });
  let text = '';
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      text += decoder.decode(value, { stream: true });
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
  if (signal.aborted) throw abortError();
  return text + decoder.decode();
}

export class FetchTransport implements Transport {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.site.replace(/\/+$/, '') + API_PREFIX;
    this.authorization =
      'Basic ' + Buffer.from(`${options.email}:${options.apiKey}`).toString('base64');
    this.timeoutMs = options.timeoutMs ?? 90000;
    this.userAgent = options.userAgent ?? 'relaybot';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async request(req: TransportRequest): Promise<unknown> {
    if (req.signal?.aborted) throw abortError();

    const params = encodeParams(req.params);
    const hasBody = req.method === 'POST' || req.method === 'PATCH';
    const query = !hasBody && [...params.keys()].length > 0 ? `?${params.toString()}` : '';
    const url = `${this.baseUrl}${req.path}${query}`;

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, req.timeoutMs ?? this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    req.signal?.addEventListener('abort', onCallerAbort, { once: true });

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method: req.method,
        headers: {
          Authorization: this.authorization,
          'User-Agent': this.userAgent,
          ...(hasBody ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {}),
        },
        body: hasBody ? params.toString() : undefined,
        signal: controller.signal,
      });
      text = await readBody(response, controller.signal);
    } catch (err) {
      if (req.signal?.aborted) throw abortError();
      if (timedOut) {
        throw new NetworkTransientError(`${req.method} ${req.path} timed out`, { cause: err });
      }
      throw new NetworkTransientError(`${req.method} ${req.path} failed: connection error`, {
        cause: err,
      });
    } finally {
      clearTimeout(timer);
      req.signal?.removeEventListener('abort', onCallerAbort);
    }

    return this.decode(req, response, text);
  }

  private decode(req: TransportRequest, response: Response, text: string): unknown {
    let body: unknown;
    try {
      body = text.length > 0 ? JSON.parse(text) : {};
    } catch {
      body = undefined;
    }

    const label = `${req.method} ${req.path}`;
    if (response.status === 429) {
      throw new NetworkTransientError(`${label} rate limited`, {
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after'), body),
      });
    }
    if (response.status >= 500) {
      throw new NetworkTransientError(`${label} returned HTTP ${response.status}`);
    }
    if (response.status === 401 || response.status === 403) {
      throw new NetworkFatalError(`${label} rejected credentials (HTTP ${response.status})`);
    }

    const apiError = errorResponseSchema.safeParse(body);
    if (apiError.success) {
      throw new ChatApiError(apiError.data.code, response.status, apiError.data.msg);
    }
    if (body === undefined) {
      throw new NetworkFatalError(`${label} returned a non-JSON body (HTTP ${response.status})`);
    }
    if (!response.ok) {
      throw new NetworkFatalError(`${label} returned HTTP ${response.status}`);
    }
    return body;
  }
}
