/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { applyEnvironment, loadConfig, localConfigPath, parseConfig, saveConfig } from '../config.js';
import { ConfigurationError } from '../migrate/errors.js';

const ENV = {
  ZEPHYR_API_TOKEN: 'test-secret',
  ZEPHYR_BASE_URL: 'https://zephyr.test',
  QTEST_API_TOKEN: 'test-secret',
  QTEST_BASE_URL: 'https://qtest.test',
};

describe('applyEnvironment', () => {
  it('should fill credentials the file leaves out', () => {
    expect(applyEnvironment({ source: { projectKey: 'PRJ' } }, ENV)).toEqual({
      source: { projectKey: 'PRJ', token: 'test-secret', baseUrl: 'https://zephyr.test' },
      destination: { token: 'test-secret', baseUrl: 'https://qtest.test' },
    });
  });

  it('should keep values from the file', () => {
    const filled = applyEnvironment({ source: { token: 'file-token' } }, ENV);
    expect(filled.source).toMatchObject({ token: 'file-token' });
  });

  it('should read username and password for the password grant', () => {
    const filled = applyEnvironment({}, { QTEST_USERNAME: 'tester', QTEST_PASSWORD: 'test-secret' });
    expect(filled.destination).toEqual({ username: 'tester', password: 'test-secret' });
  });
});

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const config = parseConfig({ source: { projectKey: 'PRJ' }, destination: { projectId: 7 } }, ENV);

    expect(config.source).toMatchObject({ projectKey: 'PRJ', pageSize: 100, timeoutMs: 30_000 });
    expect(config.source.retry).toMatchObject({ maxRetries: 3, baseDelayMs: 100, multiplier: 2 });
    expect(config.source.rateLimit).toEqual({ requestsPerSecond: 10, burst: 5, maxConcurrent: 4 });
    expect(config.destination.projectId).toBe('7');
    expect(config.staging).toEqual({
      databasePath: join('.tm-migrate', 'staging.db'),
      attachmentsDir: join('.tm-migrate', 'attachments'),
    });
    expect(config).toMatchObject({ batchSize: 50, maxRollbackRetries: 2, maxFixedPointIterations: 25 });
    expect(config.mappings).toEqual({ priorities: {}, statuses: {}, customFields: {} });
    expect(config.entityTypes).toBeUndefined();
  });

  it('should default custom field types to text', () => {
    const config = parseConfig(
      { source: { projectKey: 'PRJ' }, destination: { projectId: 7 }, mappings: { customFields: { Team: { fieldId: 9 } } } },
      ENV,
    );
    expect(config.mappings.customFields.Team).toEqual({ fieldId: 9, type: 'TEXT' });
  });

  it('should report every invalid field', () => {
    let error: unknown;
    try {
      parseConfig({ source: { projectKey: 'PRJ' }, destination: { baseUrl: 'https://qtest.test', projectId: 7 }, batchSize: 0 }, {});
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    const issues = error instanceof ConfigurationError ? error.issues : [];
    expect(issues).toContain('source.baseUrl: Required');
    expect(issues).toContain('source.token: Required');
    expect(issues).toContain('batchSize: Number must be greater than or equal to 1');
  });

  it('should require a qTest token or username and password', () => {
    expect(() =>
      parseConfig(
        { source: { projectKey: 'PRJ' }, destination: { projectId: 7, username: 'tester' } },
        { ZEPHYR_API_TOKEN: 'test-secret', ZEPHYR_BASE_URL: 'https://zephyr.test', QTEST_BASE_URL: 'https://qtest.test' },
      ),
    ).toThrow('destination: destination needs a token (QTEST_API_TOKEN) or username and password');
  });

  it('should reject unknown entity types', () => {
    expect(() =>
      parseConfig({ source: { projectKey: 'PRJ' }, destination: { projectId: 7 }, entityTypes: ['requirement'] }, ENV),
    ).toThrow(ConfigurationError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tm-migrate-config-'));
    for (const [key, value] of Object.entries(ENV)) {
      vi.stubEnv(key, value);
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the local config file', async () => {
    await saveConfig({ source: { projectKey: 'PRJ' }, destination: { projectId: '7' } }, localConfigPath(dir));

    const config = await loadConfig(undefined, dir);

    expect(config.source.projectKey).toBe('PRJ');
    expect(config.source.baseUrl).toBe('https://zephyr.test');
  });

  it('should resolve an explicit path against the working directory', async () => {
    await saveConfig({ source: { projectKey: 'ALT' }, destination: { projectId: 1 } }, join(dir, 'alt.json'));

    await expect(loadConfig('alt.json', dir)).resolves.toMatchObject({ source: { projectKey: 'ALT' } });
  });

  it('should fail when the file is missing', async () => {
    await expect(loadConfig(undefined, dir)).rejects.toThrow(
      `Configuration file not found: ${localConfigPath(dir)}`,
    );
  });

  it('should fail on malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "source": ');

    await expect(loadConfig(path)).rejects.toThrow(/^Configuration file is not valid JSON/);
  });
});
