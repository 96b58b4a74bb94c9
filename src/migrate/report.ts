/**
 * Migration Report
 *
 * Per-type entity counts, type status and the list of failures of a run.
 */

import { emptyCounts, type StagingStore } from './staging/store.js';
import { ENTITY_STATUSES, type MigrationReport } from './types.js';

export function buildReport(store: StagingStore, runId: string, now: () => Date = () => new Date()): MigrationReport {
  const run = store.requireRun(runId);
  const totals = emptyCounts();

  const types = store.listCheckpoints(runId).map((checkpoint) => {
    const counts = store.countByStatus(runId, checkpoint.entityType);
    for (const status of ENTITY_STATUSES) {
      totals[status] += counts[status];
    }
    return {
      entityType: checkpoint.entityType,
      status: checkpoint.status,
      counts,
      error: checkpoint.error,
    };
  });

  return {
    runId: run.id,
    projectKey: run.projectKey,
    status: run.status,
    generatedAt: now().toISOString(),
    types,
    totals,
    failures: store.listFailures(runId),
  };
}
