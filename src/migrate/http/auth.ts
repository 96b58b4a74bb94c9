/**
 * Token Providers
 *
 * Supply the bearer token for an API client. The static provider wraps a
 * pre-issued token; the OAuth provider performs a password grant and caches
 * the access token until shortly before it expires.
 */

import { z } from 'zod';
import { AuthenticationError, TransientNetworkError } from '../errors.js';
import { systemClock, type Clock } from './clock.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TokenProvider {
  getToken(): Promise<string>;
  /** Drop any cached token so the next call fetches a fresh one. */
  invalidate(): void;
}

/**
 * Strip a leading "Bearer " so the header can be rebuilt in canonical form.
 */
export function normalizeToken(token: string): string {
  const trimmed = token.trim();
  return /^bearer\s+/i.test(trimmed) ? trimmed.replace(/^bearer\s+/i, '').trim() : trimmed;
}

export class StaticTokenProvider implements TokenProvider {
  private readonly token: string;

  constructor(token: string) {
    this.token = normalizeToken(token);
    if (!this.token) {
      throw new AuthenticationError('Empty API token');
    }
  }

  async getToken(): Promise<string> {
    return this.token;
  }

  invalidate(): void {
    // Nothing cached.
  }
}

export interface OAuthPasswordOptions {
  baseUrl: string;
  username: string;
  password: string;
  /** Client name sent as the Basic credential (any string) */
  clientName?: string;
  fetch?: FetchLike;
  clock?: Clock;
}

const OAuthTokenResponseSchema = z.object({
  access_token: z.string().min(1).optional(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

/** Refresh this long before the server-reported expiry. */
const EXPIRY_MARGIN_MS = 60_000;

export class OAuthPasswordTokenProvider implements TokenProvider {
  private readonly options: OAuthPasswordOptions;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private token: string | null = null;
  private expiresAt = 0;
  private pending: Promise<string> | null = null;

  constructor(options: OAuthPasswordOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.clock = options.clock ?? systemClock;
  }

  async getToken(): Promise<string> {
    if (this.token && this.clock.now() < this.expiresAt) {
      return this.token;
    }
    // Concurrent callers share one token request.
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }

  private async requestToken(): Promise<string> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/oauth/token`;
    const client = Buffer.from(`${this.options.clientName ?? 'tm-migrate'}:`).toString('base64');
    const body = new URLSearchParams({
      grant_type: 'password',
      username: this.options.username,
      password: this.options.password,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Cache-Control': 'no-cache',
          Authorization: `Basic ${client}`,
        },
        body: body.toString(),
      });
    } catch (err) {
      throw new TransientNetworkError(`Token request to ${url} failed: ${String(err)}`, undefined, { cause: err });
    }

    if (!response.ok) {
      if (response.status >= 500) {
        throw new TransientNetworkError(`Token endpoint returned ${response.status}`, response.status);
      }
      throw new AuthenticationError(`Authentication failed with status ${response.status}`, response.status);
    }

    const parsed = OAuthTokenResponseSchema.safeParse(await response.json().catch(() => null));
    const accessToken = parsed.success ? parsed.data.access_token : undefined;
    if (!parsed.success || !accessToken) {
      throw new AuthenticationError('No access token returned from authentication endpoint');
    }

    this.token = accessToken;
    const lifetimeMs = (parsed.data.expires_in ?? 3600) * 1000;
    this.expiresAt = this.clock.now() + Math.max(0, lifetimeMs - EXPIRY_MARGIN_MS);
    return this.token;
  }
}
