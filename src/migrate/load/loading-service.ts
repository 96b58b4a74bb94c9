/**
 * Loading Service
 *
 * Submits transformed entities of one type to the destination in batches.
 *
 * Every successful create is journaled before anything else happens, so a
 * crash between create and commit leaves a row that the next pass deletes
 * from the destination. An integrity failure anywhere in a batch rolls the
 * whole batch back and retries it.
 */

import { randomBytes } from 'node:crypto';

import { silentLogger, type Logger } from '../../logger.js';
import {
  ClientRequestError,
  IntegrityError,
  errorCode,
  errorMessage,
  isFatal,
} from '../errors.js';
import type { CorrelationMap } from '../staging/correlation-map.js';
import type { LoadedResult, StagingStore } from '../staging/store.js';
import { WriteQueue } from '../staging/write-queue.js';
import type { DestinationAdapter, EntityType, SourceEntity, TransformedPayload } from '../types.js';

export interface LoadPassResult {
  loaded: number;
  failed: number;
  rollbacks: number;
  orphansRemoved: number;
  cancelled: boolean;
}

export interface LoadProgress {
  entityType: EntityType;
  loaded: number;
  failed: number;
}

export interface LoadingServiceOptions {
  store: StagingStore;
  destination: DestinationAdapter;
  correlations: CorrelationMap;
  batchSize: number;
  maxRollbackRetries: number;
  logger?: Logger;
  onProgress?: (progress: LoadProgress) => void;
}

interface Submitted {
  sourceId: string;
  payload: TransformedPayload;
  destinationId: string;
}

interface BatchOutcome {
  loaded: number;
  failed: number;
  rollbacks: number;
}

export class LoadingService {
  private readonly store: StagingStore;
  private readonly destination: DestinationAdapter;
  private readonly correlations: CorrelationMap;
  private readonly batchSize: number;
  private readonly maxRollbackRetries: number;
  private readonly logger: Logger;
  private readonly onProgress?: (progress: LoadProgress) => void;

  constructor(options: LoadingServiceOptions) {
    this.store = options.store;
    this.destination = options.destination;
    this.correlations = options.correlations;
    this.batchSize = options.batchSize;
    this.maxRollbackRetries = options.maxRollbackRetries;
    this.logger = (options.logger ?? silentLogger).child('load');
    this.onProgress = options.onProgress;
  }

  /**
   * Load every `transformed` entity of one type. Cancellation is honoured
   * between batches.
   */
  async loadPass(runId: string, type: EntityType, signal?: AbortSignal): Promise<LoadPassResult> {
    const result: LoadPassResult = { loaded: 0, failed: 0, rollbacks: 0, orphansRemoved: 0, cancelled: false };
    result.orphansRemoved = await this.recoverOrphans(runId, type);

    for (;;) {
      if (signal?.aborted) {
        result.cancelled = true;
        break;
      }

      const batch = this.store.listEntities(runId, type, 'transformed', this.batchSize);
      if (batch.length === 0) break;

      const outcome = await this.loadBatch(runId, type, batch);
      result.loaded += outcome.loaded;
      result.failed += outcome.failed;
      result.rollbacks += outcome.rollbacks;
      this.onProgress?.({ entityType: type, loaded: result.loaded, failed: result.failed });
    }

    return result;
  }

  /**
   * Delete destination entities journaled by an earlier pass that never
   * committed. An entity whose orphan cannot be deleted is failed so that
   * it is not created twice; its journal row stays for the next attempt.
   */
  private async recoverOrphans(runId: string, type: EntityType): Promise<number> {
    let removed = 0;

    for (const orphan of this.store.listJournal(runId, type)) {
      try {
        await this.destination.remove(orphan.payload, orphan.destinationId);
      } catch (err) {
        if (isFatal(err)) throw err;
        if (!(err instanceof ClientRequestError && err.status === 404)) {
          const reason = `Orphaned ${type} ${orphan.destinationId} could not be deleted: ${errorMessage(err)}`;
          this.logger.error(reason);
          this.store.markFailed(runId, type, orphan.sourceId, 'ORPHAN_CLEANUP', reason);
          continue;
        }
      }
      this.store.removeJournal(runId, type, orphan.sourceId);
      removed++;
    }

    if (removed > 0) {
      this.logger.warn(`${type}: removed ${removed} orphaned destination entit${removed === 1 ? 'y' : 'ies'}`);
    }
    return removed;
  }

  private async loadBatch(runId: string, type: EntityType, batch: SourceEntity[]): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { loaded: 0, failed: 0, rollbacks: 0 };
    let entities = batch;

    for (;;) {
      const alreadyLoaded: LoadedResult[] = [];
      const pending: Array<{ entity: SourceEntity; payload: TransformedPayload }> = [];

      for (const entity of entities) {
        const destinationId = this.correlations.resolve(type, entity.sourceId);
        if (destinationId !== undefined) {
          alreadyLoaded.push({ sourceId: entity.sourceId, destinationId });
        } else if (entity.transformed) {
          pending.push({ entity, payload: entity.transformed });
        } else {
          this.store.markFailed(runId, type, entity.sourceId, 'VALIDATION', 'Transformed payload is missing');
          outcome.failed++;
        }
      }

      const batchId = `batch_${randomBytes(6).toString('hex')}`;
      const queue = new WriteQueue();

      const settled = await Promise.allSettled(
        pending.map(async ({ entity, payload }): Promise<Submitted> => {
          const destinationId = await this.destination.create({ ...payload, runId, sourceId: entity.sourceId });
          await queue.enqueue(() =>
            this.store.addJournal({ runId, entityType: type, sourceId: entity.sourceId, destinationId, batchId, payload }),
          );
          return { sourceId: entity.sourceId, payload, destinationId };
        }),
      );
      await queue.drain();

      const submitted: Submitted[] = [];
      const failures: Array<{ sourceId: string; error: unknown }> = [];
      settled.forEach((settlement, i) => {
        if (settlement.status === 'fulfilled') {
          submitted.push(settlement.value);
        } else {
          failures.push({ sourceId: pending[i].entity.sourceId, error: settlement.reason });
        }
      });

      const fatal = failures.find((failure) => isFatal(failure.error));
      if (fatal) {
        // Journal rows of this batch are deleted by orphan recovery on resume.
        throw fatal.error;
      }

      const integrity = failures.find((failure) => failure.error instanceof IntegrityError);
      if (!integrity) {
        for (const failure of failures) {
          this.store.markFailed(runId, type, failure.sourceId, errorCode(failure.error), errorMessage(failure.error));
          this.logger.warn(`${type} ${failure.sourceId}: ${errorMessage(failure.error)}`);
        }
        outcome.failed += failures.length;

        const results = [
          ...alreadyLoaded,
          ...submitted.map(({ sourceId, destinationId }) => ({ sourceId, destinationId })),
        ];
        for (const entry of this.store.commitLoaded(runId, type, results)) {
          this.correlations.remember(type, entry.sourceId, entry.destinationId);
        }
        outcome.loaded += results.length;
        return outcome;
      }

      // Integrity failure: undo the batch and try again.
      outcome.rollbacks++;
      this.logger.warn(`${type}: rolling back batch ${batchId}: ${errorMessage(integrity.error)}`);
      const stuck = await this.rollback(runId, type, submitted);
      outcome.failed += stuck.size;

      const retry = entities.filter((entity) => !stuck.has(entity.sourceId));
      this.store.revertToTransformed(
        runId,
        type,
        retry.map((entity) => entity.sourceId),
      );

      entities = retry
        .map((entity) => this.store.getEntity(runId, type, entity.sourceId))
        .filter((entity): entity is SourceEntity => entity?.status === 'transformed');

      const exhausted = entities.some((entity) => entity.attempts > this.maxRollbackRetries);
      if (exhausted) {
        const error = new IntegrityError(
          `Batch rolled back ${this.maxRollbackRetries + 1} time(s): ${errorMessage(integrity.error)}`,
        );
        for (const entity of entities) {
          this.store.markFailed(runId, type, entity.sourceId, error.code, error.message);
        }
        outcome.failed += entities.length;
        return outcome;
      }
      if (entities.length === 0) return outcome;
    }
  }

  /**
   * Delete every entity the batch created. Returns the source IDs whose
   * compensating delete failed; they are failed and keep their journal row.
   */
  private async rollback(runId: string, type: EntityType, submitted: Submitted[]): Promise<Set<string>> {
    const stuck = new Set<string>();

    const settled = await Promise.allSettled(
      submitted.map((item) => this.destination.remove(item.payload, item.destinationId)),
    );

    settled.forEach((settlement, i) => {
      const item = submitted[i];
      if (settlement.status === 'fulfilled') {
        this.store.removeJournal(runId, type, item.sourceId);
        return;
      }
      const reason = `Rollback could not delete ${type} ${item.destinationId}: ${errorMessage(settlement.reason)}`;
      this.logger.error(reason);
      this.store.markFailed(runId, type, item.sourceId, 'ROLLBACK_FAILED', reason);
      stuck.add(item.sourceId);
    });

    return stuck;
  }
}
