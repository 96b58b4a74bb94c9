/**
 * Custom Field Conversion
 *
 * Turns source custom field values into qTest property values according to
 * the field type configured for each mapped field.
 */

import type { CustomFieldMapping } from '../../../config.js';
import { isRecord } from '../../json.js';
import type { ZephyrCustomFields } from '../../source/zephyr-schemas.js';
import type { QTestProperty } from '../../types.js';

export type CustomFieldType = CustomFieldMapping['type'];

export type FieldValue = string | number | boolean;

const TRUTHY = new Set(['true', 'yes', '1', 'on']);

function text(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isRecord(value)) {
    for (const key of ['name', 'label', 'value']) {
      const field = value[key];
      if (typeof field === 'string' || typeof field === 'number') return String(field);
    }
  }
  return JSON.stringify(value);
}

/**
 * Render a table value as pipe-separated rows. Lists of objects use the
 * sorted union of their keys as the header row; lists of lists use the
 * first row as header when it holds only strings.
 */
export function formatTable(value: unknown): string {
  if (!Array.isArray(value)) return text(value);
  const table: unknown[] = value;
  if (table.length === 0) return '';

  const first = table[0];

  if (isRecord(first)) {
    const headers = [...new Set(table.filter(isRecord).flatMap((row) => Object.keys(row)))].sort();
    const headerRow = headers.join(' | ');
    const rows = [headerRow, '-'.repeat(headerRow.length)];
    for (const row of table) {
      rows.push(isRecord(row) ? headers.map((h) => text(row[h])).join(' | ') : text(row));
    }
    return rows.join('\n');
  }

  if (Array.isArray(first)) {
    const headerCells: unknown[] = first;
    const hasHeaders = headerCells.every((cell) => typeof cell === 'string');
    if (!hasHeaders) {
      return table.map((row) => (Array.isArray(row) ? row.map(text).join(' | ') : text(row))).join('\n');
    }

    const headers = headerCells.map(text);
    const width = headers.reduce((sum, h) => sum + h.length + 3, 0);
    const rows = [headers.join(' | '), '-'.repeat(width)];
    for (const row of table.slice(1)) {
      if (!Array.isArray(row)) {
        rows.push(text(row));
        continue;
      }
      const cells = row.slice(0, headers.length).map(text);
      while (cells.length < headers.length) cells.push('');
      rows.push(cells.join(' | '));
    }
    return rows.join('\n');
  }

  return table.map(text).join('\n');
}

/**
 * Render a hierarchical selection as a "a > b > c" path.
 */
export function formatHierarchy(value: unknown): string {
  if (value === null || value === undefined || value === '') return '';

  if (isRecord(value)) {
    if ('id' in value && 'name' in value) return text(value.name);
    if ('value' in value && 'label' in value) return text(value.label);
    return Object.entries(value)
      .map(([key, v]) => `${key}: ${text(v)}`)
      .join(' > ');
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    if (items.length > 0 && items.every(isRecord)) {
      const path = items
        .map((item) => item.name ?? item.label ?? item.value)
        .filter((part) => part !== undefined)
        .map(text);
      if (path.length > 0) return path.join(' > ');
    }
    return items.map(text).join(', ');
  }

  return text(value);
}

function userName(value: unknown): string {
  if (isRecord(value)) {
    for (const key of ['name', 'displayName', 'username', 'value', 'id', 'accountId']) {
      const field = value[key];
      if ((typeof field === 'string' && field) || typeof field === 'number') return String(field);
    }
  }
  return text(value);
}

function toDate(value: unknown, dateOnly: boolean): string {
  if (typeof value === 'string' && value.trim()) {
    const ms = Date.parse(value);
    if (!Number.isNaN(ms)) {
      const iso = new Date(ms).toISOString();
      return dateOnly ? iso.slice(0, 10) : iso;
    }
  }
  return text(value);
}

/**
 * Convert one value to its qTest representation.
 */
export function convertFieldValue(type: CustomFieldType, value: unknown): FieldValue {
  if (value === null || value === undefined) return '';

  switch (type) {
    case 'CHECKBOX':
      if (typeof value === 'boolean') return value;
      if (typeof value === 'string') return TRUTHY.has(value.trim().toLowerCase());
      if (typeof value === 'number') return value !== 0;
      return Boolean(value);
    case 'NUMERIC': {
      if (typeof value === 'number') return value;
      if (typeof value === 'string' && value.trim()) {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : 0;
      }
      return 0;
    }
    case 'DATE':
      return toDate(value, true);
    case 'DATETIME':
      return toDate(value, false);
    case 'MULTIPLE_SELECT':
      return Array.isArray(value) ? value.map(text).join(', ') : text(value);
    case 'USER':
      return userName(value);
    case 'TABLE':
      return formatTable(value);
    case 'HIERARCHICAL_SELECT':
      return formatHierarchy(value);
    case 'TEXT':
    case 'PARAGRAPH':
    case 'SINGLE_SELECT':
      return text(value);
  }
}

interface NamedValue {
  name: string;
  value: unknown;
}

function entries(fields: ZephyrCustomFields | null | undefined): NamedValue[] {
  if (!fields) return [];
  if (Array.isArray(fields)) return fields.map((field) => ({ name: field.name, value: field.value }));
  return Object.entries(fields).map(([name, value]) => ({ name, value }));
}

/**
 * Map source custom fields to qTest properties. Fields without a configured
 * mapping are skipped and reported through `warn`.
 */
export function mapCustomFields(
  fields: ZephyrCustomFields | null | undefined,
  mappings: Readonly<Record<string, CustomFieldMapping>>,
  warn: (message: string) => void,
): QTestProperty[] {
  const properties: QTestProperty[] = [];
  for (const { name, value } of entries(fields)) {
    const mapping = mappings[name];
    if (!mapping) {
      warn(`No mapping for custom field "${name}"; skipped`);
      continue;
    }
    properties.push({ field_id: mapping.fieldId, field_value: convertFieldValue(mapping.type, value) });
  }
  return properties;
}
