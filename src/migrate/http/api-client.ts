/**
 * Rate-Limited API Client
 *
 * Shared by the source and destination adapters; each direction owns one
 * independently configured instance (its own host, token, bucket and
 * circuits).
 *
 * - Token bucket + concurrency cap on every request
 * - Exponential backoff with jitter on 429/5xx/network errors
 * - Retry-After honoured for 429 and 503
 * - Immediate failure on other 4xx, classified into the error taxonomy
 * - Per-endpoint circuit breaker
 */

import { createWriteStream, openAsBlob } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import {
  AuthenticationError,
  ClientRequestError,
  IntegrityError,
  MigrationError,
  RateLimitError,
  TransientNetworkError,
  errorMessage,
} from '../errors.js';
import { silentLogger, type Logger } from '../../logger.js';
import type { FetchLike, TokenProvider } from './auth.js';
import { CircuitBreaker, type CircuitBreakerOptions } from './circuit-breaker.js';
import { systemClock, type Clock } from './clock.js';
import { TokenBucketLimiter, type RateLimiterOptions } from './rate-limiter.js';
import { DEFAULT_RETRY_POLICY, parseRetryAfter, retryDelay, type RetryPolicy } from './retry.js';

// ─── Types ───────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  /** JSON body */
  body?: unknown;
  /** Multipart body (takes precedence over `body`) */
  form?: FormData;
  headers?: Record<string, string>;
  /** Circuit breaker key, e.g. "/testcases/{key}/attachments" (defaults to the path) */
  endpointKey?: string;
  /** Per-request timeout override */
  timeoutMs?: number;
}

export interface Page<T> {
  items: T[];
  nextCursor: string | null;
}

/**
 * Translates between an opaque cursor and an API's pagination parameters.
 */
export interface PageAdapter<T> {
  query(cursor: string | null): Record<string, QueryValue>;
  parse(body: unknown, cursor: string | null): Page<T>;
}

export interface ApiClientOptions {
  /** Label used in log lines */
  name: string;
  baseUrl: string;
  tokenProvider: TokenProvider;
  rateLimit: RateLimiterOptions;
  retry?: Partial<RetryPolicy>;
  circuitBreaker?: CircuitBreakerOptions;
  timeoutMs?: number;
  fetch?: FetchLike;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

/** Injectable runtime pieces, shared by the adapter factories. */
export type ClientRuntime = Pick<ApiClientOptions, 'fetch' | 'clock' | 'random' | 'logger'>;

const DEFAULT_TIMEOUT_MS = 30_000;
const DOWNLOAD_TIMEOUT_MS = 120_000;

// ─── Client ──────────────────────────────────────────────────

export class ApiClient {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly tokenProvider: TokenProvider;
  private readonly limiter: TokenBucketLimiter;
  private readonly retry: RetryPolicy;
  private readonly breaker: CircuitBreaker | null;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(options: ApiClientOptions) {
    this.name = options.name;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.tokenProvider = options.tokenProvider;
    this.clock = options.clock ?? systemClock;
    this.limiter = new TokenBucketLimiter(options.rateLimit, this.clock);
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.breaker = options.circuitBreaker ? new CircuitBreaker(options.circuitBreaker, this.clock) : null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.random = options.random ?? Math.random;
    this.logger = (options.logger ?? silentLogger).child(options.name);
  }

  // ─── Public API ────────────────────────────────────────────

  /**
   * Issue a request and return the parsed JSON body (undefined when empty).
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.execute(method, path, options, readJson);
  }

  /**
   * Fetch one page starting at `cursor`.
   */
  async fetchPage<T>(path: string, cursor: string | null, adapter: PageAdapter<T>, options: RequestOptions = {}): Promise<Page<T>> {
    const body = await this.request('GET', path, {
      ...options,
      query: { ...options.query, ...adapter.query(cursor) },
    });
    return adapter.parse(body, cursor);
  }

  /**
   * Create a resource and return its identifier.
   */
  async submit(path: string, payload: unknown, options: RequestOptions = {}): Promise<string> {
    const body = await this.request('POST', path, { ...options, body: payload });
    return requireId(body, `POST ${path}`);
  }

  /**
   * Delete a resource. Compensating calls use this during rollback.
   */
  async remove(path: string, options: RequestOptions = {}): Promise<void> {
    await this.request('DELETE', path, options);
  }

  /**
   * Stream a binary response body to `filePath`. Returns bytes written.
   */
  async download(path: string, filePath: string, options: RequestOptions = {}): Promise<number> {
    await mkdir(dirname(filePath), { recursive: true });

    return this.execute(
      'GET',
      path,
      { timeoutMs: DOWNLOAD_TIMEOUT_MS, ...options, headers: { Accept: '*/*', ...options.headers } },
      async (response) => {
        if (!response.body) {
          throw new TransientNetworkError(`GET ${path} returned no body`, response.status);
        }
        const output = createWriteStream(filePath);
        try {
          await pipeline(Readable.fromWeb(response.body), output);
        } catch (err) {
          await rm(filePath, { force: true });
          throw new TransientNetworkError(`Download of ${path} interrupted: ${errorMessage(err)}`, undefined, {
            cause: err,
          });
        }
        return output.bytesWritten;
      },
    );
  }

  /**
   * Upload a local file as multipart form data and return the created identifier.
   */
  async upload(
    path: string,
    filePath: string,
    filename: string,
    contentType: string,
    options: RequestOptions = {},
  ): Promise<string> {
    // Fresh form per attempt: a consumed body cannot be resent.
    const body = await this.execute('POST', path, options, readJson, async () => {
      const form = new FormData();
      form.append('file', await openAsBlob(filePath, { type: contentType }), filename);
      return form;
    });
    return requireId(body, `POST ${path}`);
  }

  stats() {
    return this.limiter.stats();
  }

  // ─── Retry Loop ────────────────────────────────────────────

  private async execute<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    consume: (response: Response) => Promise<T>,
    buildForm?: () => Promise<FormData>,
  ): Promise<T> {
    const endpoint = options.endpointKey ?? path;
    this.breaker?.check(endpoint);

    let attempt = 0;
    for (;;) {
      try {
        const form = buildForm ? await buildForm() : options.form;
        const result = await this.limiter.schedule(() => this.attempt(method, path, { ...options, form }, consume));
        this.breaker?.recordSuccess(endpoint);
        return result;
      } catch (err) {
        if (err instanceof RateLimitError || err instanceof TransientNetworkError) {
          if (attempt < this.retry.maxRetries) {
            const delay = retryDelay(this.retry, err, attempt, this.random);
            attempt++;
            this.logger.warn(
              `${method} ${path}: ${err.message}. Retrying in ${delay}ms (attempt ${attempt}/${this.retry.maxRetries})`,
            );
            await this.clock.sleep(delay);
            continue;
          }
          this.logger.error(`${method} ${path}: max retries (${this.retry.maxRetries}) exceeded`);
          this.breaker?.recordFailure(endpoint);
        } else if (err instanceof MigrationError) {
          this.breaker?.recordSuccess(endpoint);
        } else {
          this.breaker?.release(endpoint);
        }
        throw err;
      }
    }
  }

  private async attempt<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    consume: (response: Response) => Promise<T>,
  ): Promise<T> {
    const token = await this.tokenProvider.getToken();
    const url = this.buildUrl(path, options.query);

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${token}`,
      ...options.headers,
    };

    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs ?? this.timeoutMs);

    try {
      let response: Response;
      try {
        this.logger.debug(`${method} ${url}`);
        response = await this.fetchImpl(url, { method, headers, body, signal: controller.signal });
      } catch (err) {
        throw new TransientNetworkError(`${method} ${path} failed: ${errorMessage(err)}`, undefined, { cause: err });
      }

      if (!response.ok) {
        throw await this.classify(response, method, path);
      }

      return await consume(response);
    } finally {
      clearTimeout(timer);
    }
  }

  // ─── Helpers ───────────────────────────────────────────────

  private buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(`${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async classify(response: Response, method: HttpMethod, path: string): Promise<MigrationError> {
    const status = response.status;
    const text = await response.text().catch(() => '');
    const message = `${method} ${path} returned ${status}${text ? `: ${excerpt(text)}` : ''}`;

    if (this.retry.retryableStatuses.includes(status)) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.clock.now());
      if (status === 429) {
        return new RateLimitError(message, retryAfterMs);
      }
      return new TransientNetworkError(message, status, status === 503 ? { retryAfterMs } : undefined);
    }
    if (status === 401 || status === 403) {
      this.tokenProvider.invalidate();
      return new AuthenticationError(message, status);
    }
    if (status === 409) {
      return new IntegrityError(message, status);
    }
    return new ClientRequestError(message, status, text);
  }
}

// ─── Response Helpers ────────────────────────────────────────

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function excerpt(text: string, max = 200): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}

/**
 * Read the `id` of a created resource. A response without one means the
 * destination did not honour the create, which is an integrity problem.
 */
export function requireId(body: unknown, context: string): string {
  if (typeof body === 'object' && body !== null && 'id' in body) {
    const id = body.id;
    if (typeof id === 'string' && id.length > 0) return id;
    if (typeof id === 'number') return String(id);
  }
  throw new IntegrityError(`${context} returned no identifier`);
}
