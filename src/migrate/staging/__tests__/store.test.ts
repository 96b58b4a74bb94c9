/**
 * Staging Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StagingStore } from '../store.js';
import { CorrelationMap } from '../correlation-map.js';
import { MigrationError } from '../../errors.js';
import { VirtualClock } from '../../testing/virtual-clock.js';
import type { StagedItem, TransformedPayload } from '../../types.js';

function folder(id: string, parentId?: string): StagedItem {
  return {
    sourceId: id,
    payload: { id, name: `Folder ${id}`, parentId },
    references: parentId ? [{ role: 'parent', entityType: 'folder', sourceId: parentId }] : [],
  };
}

function modulePayload(name: string): TransformedPayload {
  return { entityType: 'folder', payload: { name } };
}

describe('StagingStore', () => {
  let clock: VirtualClock;
  let store: StagingStore;

  beforeEach(() => {
    clock = new VirtualClock();
    store = StagingStore.inMemory(clock.date);
  });

  afterEach(() => {
    store.close();
  });

  describe('runs', () => {
    it('should create a run with a pending checkpoint per selected type', () => {
      const run = store.createRun('PRJ', ['testCase', 'folder']);

      expect(run).toMatchObject({
        projectKey: 'PRJ',
        status: 'created',
        phase: 'pending',
        startedAt: '2024-01-01T00:00:00.000Z',
        completedAt: null,
        error: null,
      });
      expect(run.id).toMatch(/^run_[0-9a-f]{12}$/);
      expect(store.listCheckpoints(run.id).map((c) => [c.entityType, c.status])).toEqual([
        ['folder', 'pending'],
        ['testCase', 'pending'],
      ]);
      expect(store.findCheckpoint(run.id, 'attachment')).toBeUndefined();
    });

    it('should find the latest run and update runs', () => {
      store.createRun('PRJ');
      clock.advance(1000);
      const second = store.createRun('PRJ');

      expect(store.latestRun()?.id).toBe(second.id);
      expect(store.listRuns()).toHaveLength(2);

      clock.advance(1000);
      const updated = store.updateRun(second.id, { status: 'running', phase: 'extracting' });
      expect(updated).toMatchObject({ status: 'running', phase: 'extracting', updatedAt: '2024-01-01T00:00:02.000Z' });
      expect(store.requireRun(second.id)).toEqual(updated);
    });

    it('should reject unknown runs', () => {
      expect(() => store.requireRun('run_missing')).toThrow(
        new MigrationError('Unknown migration run: run_missing', 'RUN_NOT_FOUND', 'run', false),
      );
    });
  });

  describe('stagePage', () => {
    it('should stage items and advance the checkpoint together', () => {
      const run = store.createRun('PRJ');

      const staged = store.stagePage(run.id, 'folder', [folder('1'), folder('2', '1')], { cursor: '2', done: false });

      expect(staged).toBe(2);
      expect(store.getCheckpoint(run.id, 'folder')).toMatchObject({
        extractCursor: '2',
        extractDone: false,
        pagesFetched: 1,
        itemsStaged: 2,
        status: 'extracting',
      });
      const [first, second] = store.listEntities(run.id, 'folder');
      expect(first).toMatchObject({ sourceId: '1', status: 'staged', attempts: 0, references: [] });
      expect(second.references).toEqual([{ role: 'parent', entityType: 'folder', sourceId: '1' }]);
      expect(second.payload).toEqual({ id: '2', name: 'Folder 2', parentId: '1' });
    });

    it('should leave already staged items untouched when a page is fetched again', () => {
      const run = store.createRun('PRJ');
      store.stagePage(run.id, 'folder', [folder('1')], { cursor: '1', done: false });
      store.markFailed(run.id, 'folder', '1', 'VALIDATION', 'bad');

      const staged = store.stagePage(run.id, 'folder', [folder('1'), folder('2')], { cursor: null, done: true });

      expect(staged).toBe(1);
      expect(store.getEntity(run.id, 'folder', '1')?.status).toBe('failed');
      expect(store.getCheckpoint(run.id, 'folder')).toMatchObject({
        extractDone: true,
        pagesFetched: 2,
        itemsStaged: 2,
        status: 'extracted',
      });
    });

    it('should stage nothing when the checkpoint cannot be advanced', () => {
      const run = store.createRun('PRJ', ['folder']);

      expect(() => store.stagePage(run.id, 'testCase', [folder('1')], { cursor: null, done: true })).toThrow(
        'Entity type testCase is not part of run',
      );
      expect(store.listEntities(run.id, 'testCase')).toEqual([]);
    });
  });

  describe('entity status', () => {
    it('should track transform, failure and counts', () => {
      const run = store.createRun('PRJ');
      store.stagePage(run.id, 'folder', [folder('1'), folder('2'), folder('3')], { cursor: null, done: true });

      store.markTransformed(run.id, 'folder', '1', modulePayload('Folder 1'));
      store.markFailed(run.id, 'folder', '2', 'VALIDATION', 'name missing');

      expect(store.getEntity(run.id, 'folder', '1')?.transformed).toEqual(modulePayload('Folder 1'));
      expect(store.getCheckpoint(run.id, 'folder').lastTransformedSourceId).toBe('1');
      expect(store.countByStatus(run.id, 'folder')).toEqual({
        pending: 0,
        staged: 1,
        transformed: 1,
        loaded: 0,
        failed: 1,
      });
      expect(store.listEntities(run.id, 'folder', 'staged').map((e) => e.sourceId)).toEqual(['3']);
      expect(store.listFailures(run.id)).toEqual([
        { entityType: 'folder', sourceId: '2', code: 'VALIDATION', reason: 'name missing' },
      ]);
    });

    it('should fail every remaining entity of a status', () => {
      const run = store.createRun('PRJ');
      store.stagePage(run.id, 'folder', [folder('1'), folder('2')], { cursor: null, done: true });

      expect(store.failRemaining(run.id, 'folder', 'staged', 'UNRESOLVED_DEPENDENCY', 'never loaded')).toBe(2);
      expect(store.countByStatus(run.id).failed).toBe(2);
    });

    it('should count rollback attempts only for transformed entities', () => {
      const run = store.createRun('PRJ');
      store.stagePage(run.id, 'folder', [folder('1'), folder('2')], { cursor: null, done: true });
      store.markTransformed(run.id, 'folder', '1', modulePayload('Folder 1'));

      store.revertToTransformed(run.id, 'folder', ['1', '2']);

      expect(store.getEntity(run.id, 'folder', '1')).toMatchObject({ status: 'transformed', attempts: 1 });
      expect(store.getEntity(run.id, 'folder', '2')).toMatchObject({ status: 'staged', attempts: 0 });
    });
  });

  describe('commitLoaded', () => {
    it('should correlate, mark loaded and clear the journal in one step', () => {
      const run = store.createRun('PRJ');
      store.stagePage(run.id, 'folder', [folder('1'), folder('2')], { cursor: null, done: true });
      store.markTransformed(run.id, 'folder', '1', modulePayload('Folder 1'));
      store.markTransformed(run.id, 'folder', '2', modulePayload('Folder 2'));
      for (const [sourceId, destinationId] of [
        ['1', '101'],
        ['2', '102'],
      ]) {
        store.addJournal({
          runId: run.id,
          entityType: 'folder',
          sourceId,
          destinationId,
          batchId: 'batch_1',
          payload: modulePayload(`Folder ${sourceId}`),
        });
      }

      const entries = store.commitLoaded(run.id, 'folder', [
        { sourceId: '1', destinationId: '101' },
        { sourceId: '2', destinationId: '102' },
      ]);

      expect(entries.map((e) => [e.sourceId, e.destinationId])).toEqual([
        ['1', '101'],
        ['2', '102'],
      ]);
      expect(store.listJournal(run.id)).toEqual([]);
      expect(store.countByStatus(run.id, 'folder').loaded).toBe(2);
      expect(store.getEntity(run.id, 'folder', '1')?.transformed).toBeUndefined();
      expect(store.getCheckpoint(run.id, 'folder').lastLoadedSourceId).toBe('2');
    });
  });

  describe('correlations', () => {
    it('should keep the first destination ID for a key', () => {
      const first = store.insertCorrelation({ entityType: 'testCase', sourceId: 'T1', destinationId: 'A', runId: 'run_1' });
      const second = store.insertCorrelation({ entityType: 'testCase', sourceId: 'T1', destinationId: 'B', runId: 'run_2' });

      expect(second).toEqual(first);
      expect(second.destinationId).toBe('A');
      expect(store.listCorrelations()).toHaveLength(1);
      expect(store.listCorrelations('run_2')).toEqual([]);
    });

    it('should order entries by insertion', () => {
      store.insertCorrelation({ entityType: 'folder', sourceId: '2', destinationId: 'B', runId: 'run_1' });
      store.insertCorrelation({ entityType: 'folder', sourceId: '1', destinationId: 'A', runId: 'run_1' });

      const [a, b] = store.listCorrelations('run_1');
      expect(a.sourceId).toBe('2');
      expect(b.seq).toBeGreaterThan(a.seq);
    });

    it('should serve lookups through the correlation map', () => {
      const correlations = new CorrelationMap(store);

      expect(correlations.resolve('folder', '1')).toBeUndefined();
      store.insertCorrelation({ entityType: 'folder', sourceId: '1', destinationId: 'A', runId: 'run_1' });
      expect(correlations.resolve('folder', '1')).toBe('A');

      correlations.remember('folder', '2', 'B');
      expect(correlations.resolve('folder', '2')).toBe('B');
    });
  });

  describe('resetFailed', () => {
    it('should restage failed entities and reopen their types', () => {
      const run = store.createRun('PRJ');
      store.stagePage(run.id, 'folder', [folder('1'), folder('2')], { cursor: null, done: true });
      store.markTransformed(run.id, 'folder', '1', modulePayload('Folder 1'));
      store.commitLoaded(run.id, 'folder', [{ sourceId: '1', destinationId: '101' }]);
      store.markFailed(run.id, 'folder', '2', 'CLIENT_REQUEST', 'rejected');
      store.updateCheckpoint(run.id, 'folder', { status: 'completed' });
      store.updateCheckpoint(run.id, 'testCycle', { status: 'failed', error: 'boom' });
      store.updateCheckpoint(run.id, 'testExecution', { status: 'skipped', error: 'testCycle failed: boom' });

      const summary = store.resetFailed(run.id);

      expect(summary).toEqual({ entities: 1, types: ['folder', 'testCycle', 'testExecution'] });
      expect(store.getEntity(run.id, 'folder', '1')?.status).toBe('loaded');
      expect(store.getEntity(run.id, 'folder', '2')).toMatchObject({ status: 'staged', attempts: 0 });
      expect(store.getEntity(run.id, 'folder', '2')?.failureCode).toBeUndefined();
      expect(store.getCheckpoint(run.id, 'folder').status).toBe('extracted');
      expect(store.getCheckpoint(run.id, 'testCycle')).toMatchObject({ status: 'pending', error: null });
      expect(store.getCheckpoint(run.id, 'testExecution').status).toBe('pending');
    });
  });

  describe('transaction', () => {
    it('should roll back every write when the callback throws', () => {
      const run = store.createRun('PRJ');

      expect(() =>
        store.transaction(() => {
          store.insertCorrelation({ entityType: 'folder', sourceId: '1', destinationId: 'A', runId: run.id });
          throw new Error('abort');
        }),
      ).toThrow('abort');
      expect(store.listCorrelations()).toEqual([]);
    });
  });
});
