/**
 * Wires an orchestrator to the fake APIs, an in-memory staging store and a
 * virtual clock.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { parseConfig, type MigrationConfig } from '../../config.js';
import type { Logger } from '../../logger.js';
import { createQTestDestination, type QTestDestination } from '../destination/qtest.js';
import { MigrationOrchestrator } from '../orchestrator.js';
import { createZephyrSource, type ZephyrSource } from '../source/zephyr.js';
import { StagingStore } from '../staging/store.js';
import { FakeQTest } from './fake-qtest.js';
import { FakeZephyr } from './fake-zephyr.js';
import { VirtualClock } from './virtual-clock.js';

export interface Harness {
  config: MigrationConfig;
  clock: VirtualClock;
  zephyr: FakeZephyr;
  qtest: FakeQTest;
  store: StagingStore;
  source: ZephyrSource;
  destination: QTestDestination;
  orchestrator: MigrationOrchestrator;
  attachmentsDir: string;
  close(): void;
}

export interface HarnessOptions {
  /** Top-level config keys to override */
  config?: Record<string, unknown>;
  logger?: Logger;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const attachmentsDir = mkdtempSync(join(tmpdir(), 'tm-migrate-test-'));
  const clock = new VirtualClock();
  const zephyr = new FakeZephyr();
  const qtest = new FakeQTest();

  const config = parseConfig(
    {
      source: { baseUrl: 'https://zephyr.test', projectKey: 'PRJ', token: 'test-secret', pageSize: 2 },
      destination: {
        baseUrl: 'https://qtest.test',
        projectId: 7,
        username: 'tester',
        password: 'test-secret',
        retry: { maxRetries: 1 },
      },
      staging: { databasePath: ':memory:', attachmentsDir },
      batchSize: 2,
      ...options.config,
    },
    {},
  );

  const store = new StagingStore({ path: ':memory:', now: clock.date });
  const source = createZephyrSource(config.source, { fetch: zephyr.fetch, clock, random: () => 0 });
  const destination = createQTestDestination(config.destination, { fetch: qtest.fetch, clock, random: () => 0 });
  const orchestrator = new MigrationOrchestrator({ config, store, source, destination, logger: options.logger });

  return {
    config,
    clock,
    zephyr,
    qtest,
    store,
    source,
    destination,
    orchestrator,
    attachmentsDir,
    close: () => {
      store.close();
      rmSync(attachmentsDir, { recursive: true, force: true });
    },
  };
}
