/**
 * tm-migrate Configuration
 *
 * Manages .tm-migrate/config.json in the current project directory.
 * Credentials are taken from the environment when the file omits them.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, formatIssues } from './migrate/errors.js';
import { isRecord } from './migrate/json.js';
import { ENTITY_TYPES } from './migrate/types.js';

/** Directory name for local tm-migrate state */
export const TM_MIGRATE_DIR = '.tm-migrate';

/** Config filename */
export const CONFIG_FILE = 'config.json';

// ─── Schema ──────────────────────────────────────────────────

export const RateLimitSchema = z.object({
  /** Sustained request rate per second */
  requestsPerSecond: z.number().positive().default(10),
  /** Requests allowed above the sustained rate in a burst */
  burst: z.number().int().min(1).default(5),
  /** Maximum in-flight requests */
  maxConcurrent: z.number().int().min(1).default(4),
});

export const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().min(0).default(100),
  multiplier: z.number().min(1).default(2),
  maxDelayMs: z.number().min(0).default(60_000),
  /** Random extra delay, as a fraction of the computed delay */
  jitterRatio: z.number().min(0).max(1).default(0.25),
  retryableStatuses: z.array(z.number().int()).default([408, 429, 500, 502, 503, 504]),
});

export const CircuitBreakerSchema = z.object({
  failureThreshold: z.number().int().min(1).default(5),
  resetTimeoutMs: z.number().min(0).default(60_000),
});

const ClientSchema = z.object({
  baseUrl: z.string().url(),
  rateLimit: RateLimitSchema.default({}),
  retry: RetrySchema.default({}),
  circuitBreaker: CircuitBreakerSchema.default({}),
  timeoutMs: z.number().int().positive().default(30_000),
});

export const SourceConfigSchema = ClientSchema.extend({
  token: z.string().min(1, 'source token is required (ZEPHYR_API_TOKEN)'),
  projectKey: z.string().min(1),
  pageSize: z.number().int().min(1).max(1000).default(100),
});

export const DestinationConfigSchema = ClientSchema.extend({
  projectId: z.union([z.string(), z.number()]).transform(String),
  token: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
}).refine((d) => d.token !== undefined || (d.username !== undefined && d.password !== undefined), {
  message: 'destination needs a token (QTEST_API_TOKEN) or username and password',
});

export const CustomFieldMappingSchema = z.object({
  /** qTest field id */
  fieldId: z.number().int(),
  /** Source field type used for value conversion */
  type: z
    .enum([
      'TEXT',
      'PARAGRAPH',
      'CHECKBOX',
      'NUMERIC',
      'DATE',
      'DATETIME',
      'SINGLE_SELECT',
      'MULTIPLE_SELECT',
      'USER',
      'TABLE',
      'HIERARCHICAL_SELECT',
    ])
    .default('TEXT'),
});

export const MappingConfigSchema = z.object({
  /** Source priority name (case-insensitive) → qTest priority value id */
  priorities: z.record(z.string(), z.number().int()).default({}),
  /** Source execution status (case-insensitive) → qTest status name */
  statuses: z.record(z.string(), z.string()).default({}),
  /** Source custom field name → qTest field */
  customFields: z.record(z.string(), CustomFieldMappingSchema).default({}),
  /** qTest field id of the test case priority property */
  priorityFieldId: z.number().int().optional(),
});

export const MigrationConfigSchema = z.object({
  source: SourceConfigSchema,
  destination: DestinationConfigSchema,
  staging: z
    .object({
      databasePath: z.string().default(join(TM_MIGRATE_DIR, 'staging.db')),
      attachmentsDir: z.string().default(join(TM_MIGRATE_DIR, 'attachments')),
    })
    .default({}),
  batchSize: z.number().int().min(1).default(50),
  maxRollbackRetries: z.number().int().min(0).default(2),
  maxFixedPointIterations: z.number().int().min(1).default(25),
  entityTypes: z.array(z.enum(ENTITY_TYPES)).optional(),
  mappings: MappingConfigSchema.default({}),
});

export type RateLimitConfig = z.infer<typeof RateLimitSchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;
export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type DestinationConfig = z.infer<typeof DestinationConfigSchema>;
export type CustomFieldMapping = z.infer<typeof CustomFieldMappingSchema>;
export type MappingConfig = z.infer<typeof MappingConfigSchema>;
export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;

// ─── Paths ───────────────────────────────────────────────────

/**
 * Resolve the local .tm-migrate directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), TM_MIGRATE_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

// ─── Loading ─────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

/**
 * Fill credentials and endpoints from the environment where the raw config has none.
 */
export function applyEnvironment(raw: unknown, env: Env = process.env): Record<string, unknown> {
  const base = isRecord(raw) ? raw : {};
  const source = isRecord(base.source) ? { ...base.source } : {};
  const destination = isRecord(base.destination) ? { ...base.destination } : {};

  const fill = (target: Record<string, unknown>, key: string, value: string | undefined): void => {
    if (target[key] === undefined && value) target[key] = value;
  };

  fill(source, 'token', env.ZEPHYR_API_TOKEN);
  fill(source, 'baseUrl', env.ZEPHYR_BASE_URL);
  fill(destination, 'token', env.QTEST_API_TOKEN);
  fill(destination, 'username', env.QTEST_USERNAME);
  fill(destination, 'password', env.QTEST_PASSWORD);
  fill(destination, 'baseUrl', env.QTEST_BASE_URL);

  return { ...base, source, destination };
}

/**
 * Validate a raw configuration object, applying defaults.
 */
export function parseConfig(raw: unknown, env: Env = process.env): MigrationConfig {
  const result = MigrationConfigSchema.safeParse(applyEnvironment(raw, env));
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Load configuration from an explicit path or the local .tm-migrate/ directory.
 */
export async function loadConfig(configPath?: string, cwd?: string): Promise<MigrationConfig> {
  const path = configPath ? resolve(cwd ?? process.cwd(), configPath) : localConfigPath(cwd);

  if (!existsSync(path)) {
    throw new ConfigurationError(`Configuration file not found: ${path}`);
  }

  const raw = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${path} (${String(err)})`);
  }

  return parseConfig(parsed);
}

/**
 * Save a configuration file, creating its directory.
 */
export async function saveConfig(config: unknown, configPath: string): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}
