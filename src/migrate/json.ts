/**
 * JSON helpers shared by the adapters and the staging store.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse text that must hold a JSON object.
 */
export function parseRecord(text: string, context: string): JsonRecord {
  const value: unknown = JSON.parse(text);
  if (!isRecord(value)) {
    throw new TypeError(`${context}: expected a JSON object`);
  }
  return value;
}

/**
 * Read a string-ish field, accepting numeric IDs.
 */
export function readId(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}
