/**
 * Priority and status value maps.
 *
 * Configured overrides are consulted before the defaults; lookups ignore
 * case, surrounding whitespace, and the choice of space, hyphen or underscore.
 */

export const DEFAULT_PRIORITY = 3;

export const DEFAULT_PRIORITY_MAP: Readonly<Record<string, number>> = {
  highest: 1,
  critical: 1,
  blocker: 1,
  high: 2,
  major: 2,
  medium: 3,
  normal: 3,
  low: 4,
  minor: 4,
  lowest: 5,
  trivial: 5,
};

export const DEFAULT_STATUS = 'NOT_RUN';

export const DEFAULT_STATUS_MAP: Readonly<Record<string, string>> = {
  PASS: 'PASSED',
  PASSED: 'PASSED',
  FAIL: 'FAILED',
  FAILED: 'FAILED',
  WIP: 'IN_PROGRESS',
  IN_PROGRESS: 'IN_PROGRESS',
  INCOMPLETE: 'IN_PROGRESS',
  EXECUTING: 'IN_PROGRESS',
  BLOCKED: 'BLOCKED',
  ABORTED: 'BLOCKED',
  UNEXECUTED: 'NOT_RUN',
  NOT_EXECUTED: 'NOT_RUN',
  NOT_TESTED: 'NOT_RUN',
  NOT_RUN: 'NOT_RUN',
  PENDING: 'NOT_RUN',
  CANCELED: 'NOT_RUN',
  CANCELLED: 'NOT_RUN',
};

function normalize(value: string): string {
  return value.trim().toUpperCase().replace(/[\s-]+/g, '_');
}

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  for (const [candidate, value] of Object.entries(table)) {
    if (normalize(candidate) === key) return value;
  }
  return undefined;
}

export interface MappedValue<T> {
  value: T;
  /** False when the input was present but matched nothing */
  known: boolean;
}

export function mapPriority(
  priority: string | null | undefined,
  overrides: Readonly<Record<string, number>> = {},
): MappedValue<number> {
  if (!priority || !priority.trim()) return { value: DEFAULT_PRIORITY, known: true };
  const key = normalize(priority);
  const value = lookup(overrides, key) ?? lookup(DEFAULT_PRIORITY_MAP, key);
  return value === undefined ? { value: DEFAULT_PRIORITY, known: false } : { value, known: true };
}

export function mapStatus(
  status: string | null | undefined,
  overrides: Readonly<Record<string, string>> = {},
): MappedValue<string> {
  if (!status || !status.trim()) return { value: DEFAULT_STATUS, known: true };
  const key = normalize(status);
  const value = lookup(overrides, key) ?? lookup(DEFAULT_STATUS_MAP, key);
  return value === undefined ? { value: DEFAULT_STATUS, known: false } : { value, known: true };
}
