/**
 * Transformation Engine
 *
 * Turns staged source entities of one type into destination payloads.
 * An entity whose references are not yet correlated stays `staged` and is
 * retried on the next pass; one whose references can never be correlated
 * is failed.
 */

import type { MappingConfig } from '../../config.js';
import { silentLogger, type Logger } from '../../logger.js';
import { UnresolvedDependencyError, errorCode, errorMessage, isFatal } from '../errors.js';
import type { CorrelationMap } from '../staging/correlation-map.js';
import type { StagingStore } from '../staging/store.js';
import type { EntityReference, EntityType, SourceEntity, TransformedPayload } from '../types.js';
import type { MappingContext, MappingRuleSet } from './rules/registry.js';
import { validateTransformed } from './validation.js';

export interface TransformPassResult {
  transformed: number;
  deferred: number;
  failed: number;
}

export interface TransformationEngineOptions {
  store: StagingStore;
  correlations: CorrelationMap;
  rules: MappingRuleSet;
  mappings: MappingConfig;
  logger?: Logger;
}

type Resolution =
  | { kind: 'resolved'; ids: Map<string, string> }
  | { kind: 'deferred' }
  | { kind: 'unresolvable'; reason: string };

export class TransformationEngine {
  private readonly store: StagingStore;
  private readonly correlations: CorrelationMap;
  private readonly rules: MappingRuleSet;
  private readonly mappings: MappingConfig;
  private readonly logger: Logger;

  constructor(options: TransformationEngineOptions) {
    this.store = options.store;
    this.correlations = options.correlations;
    this.rules = options.rules;
    this.mappings = options.mappings;
    this.logger = (options.logger ?? silentLogger).child('transform');
  }

  /**
   * Process every `staged` entity of one type once, in staging order.
   */
  transformPass(runId: string, type: EntityType): TransformPassResult {
    const result: TransformPassResult = { transformed: 0, deferred: 0, failed: 0 };

    for (const entity of this.store.listEntities(runId, type, 'staged')) {
      const resolution = this.resolveReferences(entity);

      if (resolution.kind === 'deferred') {
        result.deferred++;
        continue;
      }

      if (resolution.kind === 'unresolvable') {
        const error = new UnresolvedDependencyError(resolution.reason);
        this.store.markFailed(runId, type, entity.sourceId, error.code, error.message);
        result.failed++;
        continue;
      }

      try {
        const transformed = this.apply(entity, resolution.ids);
        validateTransformed(transformed);
        this.store.markTransformed(runId, type, entity.sourceId, transformed);
        result.transformed++;
      } catch (err) {
        if (isFatal(err)) throw err;
        this.logger.warn(`${type} ${entity.sourceId}: ${errorMessage(err)}`);
        this.store.markFailed(runId, type, entity.sourceId, errorCode(err), errorMessage(err));
        result.failed++;
      }
    }

    if (result.transformed + result.failed > 0) {
      this.logger.debug(
        `${type}: ${result.transformed} transformed, ${result.deferred} deferred, ${result.failed} failed`,
      );
    }
    return result;
  }

  private resolveReferences(entity: SourceEntity): Resolution {
    const ids = new Map<string, string>();
    let deferred = false;

    for (const reference of entity.references) {
      const destinationId = this.correlations.resolve(reference.entityType, reference.sourceId);
      if (destinationId !== undefined) {
        ids.set(reference.role, destinationId);
        continue;
      }

      const reason = this.unresolvableReason(entity.runId, reference);
      if (reason !== null) {
        return { kind: 'unresolvable', reason: `${reference.role} ${reference.entityType} ${reference.sourceId} ${reason}` };
      }
      deferred = true;
    }

    return deferred ? { kind: 'deferred' } : { kind: 'resolved', ids };
  }

  /**
   * Why an uncorrelated reference can never become correlated in this run,
   * or null while it still can.
   */
  private unresolvableReason(runId: string, reference: EntityReference): string | null {
    const checkpoint = this.store.findCheckpoint(runId, reference.entityType);
    if (!checkpoint) {
      return 'is not part of this run';
    }
    if (checkpoint.status === 'failed' || checkpoint.status === 'skipped') {
      return `belongs to a ${checkpoint.status} type`;
    }

    const parent = this.store.getEntity(runId, reference.entityType, reference.sourceId);
    if (parent) {
      return parent.status === 'failed' ? `failed: ${parent.failureReason ?? 'unknown reason'}` : null;
    }
    return checkpoint.extractDone ? 'was not found in the source' : null;
  }

  private apply(entity: SourceEntity, ids: Map<string, string>): TransformedPayload {
    const context: MappingContext = {
      reference: (role) => ids.get(role),
      mappings: this.mappings,
      warn: (message) => this.logger.warn(message),
    };

    switch (entity.entityType) {
      case 'folder':
        return { entityType: 'folder', payload: this.rules.folder(entity, context) };
      case 'testCase':
        return { entityType: 'testCase', payload: this.rules.testCase(entity, context) };
      case 'testCycle':
        return { entityType: 'testCycle', payload: this.rules.testCycle(entity, context) };
      case 'testExecution':
        return { entityType: 'testExecution', payload: this.rules.testExecution(entity, context) };
      case 'attachment':
        return { entityType: 'attachment', payload: this.rules.attachment(entity, context) };
    }
  }
}
