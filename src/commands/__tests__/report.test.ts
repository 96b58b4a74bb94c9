/**
 * report and validate Command Tests
 *
 * Commands run against a staging database written beforehand; neither
 * command touches the APIs.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { saveConfig } from '../../config.js';
import { StagingStore } from '../../migrate/staging/store.js';
import { reportCommand } from '../report.js';
import { validateCommand } from '../validate.js';

describe('report and validate commands', () => {
  let dir: string;
  let configPath: string;
  let databasePath: string;
  let runId: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  /** The single JSON document printed by a --json command. */
  function printedJson(): unknown {
    const [call] = logSpy.mock.calls;
    return JSON.parse(String(call?.[0]));
  }

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'tm-migrate-report-'));
    configPath = join(dir, 'config.json');
    databasePath = join(dir, 'staging.db');
    await saveConfig(
      {
        source: { baseUrl: 'https://zephyr.test', projectKey: 'PRJ', token: 'test-secret' },
        destination: { baseUrl: 'https://qtest.test', projectId: 7, token: 'test-secret' },
        staging: { databasePath, attachmentsDir: join(dir, 'attachments') },
      },
      configPath,
    );

    const store = new StagingStore({ path: databasePath });
    const run = store.createRun('PRJ', ['folder']);
    store.stagePage(
      run.id,
      'folder',
      [
        { sourceId: '1', payload: { id: '1', name: 'Root' }, references: [] },
        { sourceId: '2', payload: { id: '2', name: '' }, references: [] },
      ],
      { cursor: null, done: true },
    );
    store.markTransformed(run.id, 'folder', '1', { entityType: 'folder', payload: { name: 'Root' } });
    store.commitLoaded(run.id, 'folder', [{ sourceId: '1', destinationId: '101' }]);
    store.markFailed(run.id, 'folder', '2', 'VALIDATION', 'name: Required');
    store.updateCheckpoint(run.id, 'folder', { status: 'completed' });
    store.updateRun(run.id, { status: 'partially-completed', phase: 'complete' });
    store.close();
    runId = run.id;

    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  it('should print the latest run report as JSON', async () => {
    await reportCommand({ config: configPath, json: true });

    expect(printedJson()).toMatchObject({
      runId,
      projectKey: 'PRJ',
      status: 'partially-completed',
      types: [{ entityType: 'folder', status: 'completed', counts: { loaded: 1, failed: 1 } }],
      failures: [{ entityType: 'folder', sourceId: '2', code: 'VALIDATION', reason: 'name: Required' }],
    });
    expect(process.exitCode).toBe(1);
  });

  it('should list every run', async () => {
    await reportCommand({ config: configPath, json: true, all: true });

    expect(printedJson()).toMatchObject([{ id: runId, status: 'partially-completed' }]);
    expect(process.exitCode).toBe(0);
  });

  it('should report an unknown run as an error', async () => {
    await reportCommand({ config: configPath, run: 'run_missing', color: false });

    expect(errorSpy).toHaveBeenCalledWith('✗ Unknown migration run: run_missing [RUN_NOT_FOUND]');
    expect(process.exitCode).toBe(1);
  });

  it('should validate the latest run', async () => {
    await validateCommand({ config: configPath, json: true });

    expect(printedJson()).toEqual({ runId, valid: true, issues: [] });
    expect(process.exitCode).toBe(0);
  });

  it('should print configuration issues', async () => {
    await validateCommand({ config: join(dir, 'missing.json'), color: false });

    expect(errorSpy).toHaveBeenCalledWith(`✗ Configuration file not found: ${join(dir, 'missing.json')} [CONFIGURATION]`);
    expect(process.exitCode).toBe(1);
  });
});
