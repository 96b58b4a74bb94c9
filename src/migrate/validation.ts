/**
 * Run Validation
 *
 * Cross-checks a run's staging rows, correlation entries and load journal.
 */

import type { StagingStore } from './staging/store.js';
import type { EntityType } from './types.js';

export type ValidationIssueCode =
  | 'MISSING_CORRELATION'
  | 'STRAY_CORRELATION'
  | 'UNFINISHED_ENTITY'
  | 'JOURNAL_ORPHAN'
  | 'PARENT_ORDER';

export interface ValidationIssue {
  code: ValidationIssueCode;
  entityType: EntityType;
  sourceId: string;
  message: string;
}

export interface RunValidation {
  runId: string;
  valid: boolean;
  issues: ValidationIssue[];
}

export function validateRun(store: StagingStore, runId: string): RunValidation {
  const run = store.requireRun(runId);
  const issues: ValidationIssue[] = [];
  const finished = run.status === 'completed' || run.status === 'partially-completed';

  for (const checkpoint of store.listCheckpoints(runId)) {
    const type = checkpoint.entityType;

    for (const entity of store.listEntities(runId, type)) {
      if (finished && (entity.status === 'staged' || entity.status === 'transformed')) {
        issues.push({
          code: 'UNFINISHED_ENTITY',
          entityType: type,
          sourceId: entity.sourceId,
          message: `still ${entity.status} after the run finished`,
        });
      }

      if (entity.status !== 'loaded') continue;

      const own = store.findCorrelation(type, entity.sourceId);
      if (!own) {
        issues.push({
          code: 'MISSING_CORRELATION',
          entityType: type,
          sourceId: entity.sourceId,
          message: 'loaded without a correlation entry',
        });
        continue;
      }

      for (const reference of entity.references) {
        const parent = store.findCorrelation(reference.entityType, reference.sourceId);
        if (parent && parent.seq > own.seq) {
          issues.push({
            code: 'PARENT_ORDER',
            entityType: type,
            sourceId: entity.sourceId,
            message: `${reference.role} ${reference.entityType} ${reference.sourceId} was correlated after its child`,
          });
        }
      }
    }
  }

  for (const correlation of store.listCorrelations(runId)) {
    const entity = store.getEntity(runId, correlation.entityType, correlation.sourceId);
    if (entity?.status !== 'loaded') {
      issues.push({
        code: 'STRAY_CORRELATION',
        entityType: correlation.entityType,
        sourceId: correlation.sourceId,
        message: `correlated to ${correlation.destinationId} but ${entity ? entity.status : 'not staged'}`,
      });
    }
  }

  for (const orphan of store.listJournal(runId)) {
    issues.push({
      code: 'JOURNAL_ORPHAN',
      entityType: orphan.entityType,
      sourceId: orphan.sourceId,
      message: `destination entity ${orphan.destinationId} was created but never committed`,
    });
  }

  return { runId, valid: issues.length === 0, issues };
}
