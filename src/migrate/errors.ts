/**
 * Migration Errors
 *
 * Every error carries the scope it aborts: a single request, one entity,
 * a load batch, a whole entity type, or the run.
 */

import type { ZodError } from 'zod';

export type ErrorScope = 'request' | 'entity' | 'batch' | 'type' | 'run';

export class MigrationError extends Error {
  readonly code: string;
  readonly scope: ErrorScope;
  readonly retryable: boolean;

  constructor(message: string, code: string, scope: ErrorScope, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.scope = scope;
    this.retryable = retryable;
  }
}

/** Network failure or retryable HTTP status (5xx, 408). */
export class TransientNetworkError extends MigrationError {
  readonly status?: number;
  /** Server's Retry-After hint, sent with 503 */
  readonly retryAfterMs?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, 'TRANSIENT_NETWORK', 'request', true, options?.cause === undefined ? undefined : { cause: options.cause });
    this.status = status;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** HTTP 429. `retryAfterMs` holds the server's hint when one was sent. */
export class RateLimitError extends MigrationError {
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message, 'RATE_LIMITED', 'request', true);
    this.retryAfterMs = retryAfterMs;
  }
}

/** Rejected credentials. Fatal to the run. */
export class AuthenticationError extends MigrationError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'AUTHENTICATION', 'run', false);
    this.status = status;
  }
}

/** Missing or invalid configuration. Fatal to the run. */
export class ConfigurationError extends MigrationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'CONFIGURATION', 'run', false);
    this.issues = issues;
  }
}

/** Non-retryable 4xx response other than auth, conflict and rate limiting. */
export class ClientRequestError extends MigrationError {
  readonly status: number;
  readonly body?: string;

  constructor(message: string, status: number, body?: string) {
    super(message, 'CLIENT_REQUEST', 'entity', false);
    this.status = status;
    this.body = body;
  }
}

/** Destination payload violates required-field constraints. */
export class ValidationError extends MigrationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'VALIDATION', 'entity', false);
    this.issues = issues;
  }
}

/** A referenced parent has no correlation and never will. */
export class UnresolvedDependencyError extends MigrationError {
  constructor(message: string) {
    super(message, 'UNRESOLVED_DEPENDENCY', 'entity', false);
  }
}

/** Destination-side invariant violation. Triggers batch rollback. */
export class IntegrityError extends MigrationError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'INTEGRITY', 'batch', false);
    this.status = status;
  }
}

/** Response body does not have the shape the API documents. */
export class MalformedResponseError extends MigrationError {
  constructor(message: string) {
    super(message, 'MALFORMED_RESPONSE', 'type', false);
  }
}

/** Endpoint circuit is open; the request was not attempted. */
export class CircuitOpenError extends MigrationError {
  readonly endpoint: string;

  constructor(endpoint: string) {
    super(`Circuit for ${endpoint} is open - failing fast`, 'CIRCUIT_OPEN', 'request', false);
    this.endpoint = endpoint;
  }
}

/**
 * Errors that end the whole run immediately.
 */
export function isFatal(error: unknown): boolean {
  return error instanceof AuthenticationError || error instanceof ConfigurationError;
}

/**
 * Short code for reports, falling back to UNKNOWN for foreign errors.
 */
export function errorCode(error: unknown): string {
  return error instanceof MigrationError ? error.code : 'UNKNOWN';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Flatten zod issues to "path: message" lines.
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
