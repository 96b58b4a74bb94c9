/**
 * Migration Orchestrator
 *
 * Coordinates the three-phase migration process:
 * Extract → Transform → Load
 *
 * Entity types are processed one at a time in dependency order. Each type is
 * extracted, then transformed and loaded repeatedly until a round changes
 * nothing, so entities that reference others of the same type (nested
 * folders) are loaded parent first.
 *
 * All progress lives in the staging store: a run interrupted at any point
 * can be resumed by ID.
 */

import type { MigrationConfig } from '../config.js';
import { silentLogger, type Logger } from '../logger.js';
import { dependentsOf } from './entities.js';
import { MigrationError, UnresolvedDependencyError, errorMessage } from './errors.js';
import { ExtractionService } from './extract/extraction-service.js';
import { LoadingService } from './load/loading-service.js';
import { buildReport } from './report.js';
import { CorrelationMap } from './staging/correlation-map.js';
import type { StagingStore } from './staging/store.js';
import { getMappingRules, type MappingRuleSet } from './transform/rules/registry.js';
import { TransformationEngine } from './transform/transformation-engine.js';
import {
  ENTITY_TYPES,
  type DestinationAdapter,
  type EntityType,
  type MigrationPhase,
  type MigrationReport,
  type MigrationRun,
  type RunStatus,
  type SourceAdapter,
} from './types.js';

// ─── Events ──────────────────────────────────────────────────

export type MigrationEventType =
  | 'phase:start'
  | 'phase:complete'
  | 'type:start'
  | 'type:complete'
  | 'progress'
  | 'checkpoint'
  | 'complete'
  | 'error';

/** Running totals carried by `progress` events. */
export interface ProgressCounts {
  pagesFetched?: number;
  itemsStaged?: number;
  loaded?: number;
  failed?: number;
}

export interface MigrationEvent {
  type: MigrationEventType;
  runId: string;
  phase?: MigrationPhase;
  entityType?: EntityType;
  progress?: ProgressCounts;
  message?: string;
  error?: Error;
  data?: unknown;
}

export type MigrationEventHandler = (event: MigrationEvent) => void;

// ─── Options ─────────────────────────────────────────────────

export interface MigrationOrchestratorOptions {
  config: MigrationConfig;
  store: StagingStore;
  source: SourceAdapter;
  destination: DestinationAdapter;
  /** Overrides the registered rule set for the source→destination pair */
  rules?: MappingRuleSet;
  logger?: Logger;
}

export interface ResumeOptions {
  /** Return failed entities to `staged` and reopen failed or skipped types */
  retryFailed?: boolean;
}

interface TypeSteps {
  extract: boolean;
  transform: boolean;
  load: boolean;
}

/** Phases that are also a type's status while it runs. */
type ActivePhase = 'extracting' | 'transforming' | 'loading';

const FULL: TypeSteps = { extract: true, transform: true, load: true };

// ─── Orchestrator ────────────────────────────────────────────

export class MigrationOrchestrator {
  private readonly config: MigrationConfig;
  private readonly store: StagingStore;
  private readonly logger: Logger;
  private readonly extraction: ExtractionService;
  private readonly transformation: TransformationEngine;
  private readonly loading: LoadingService;
  private eventHandlers: MigrationEventHandler[] = [];
  private controller = new AbortController();
  private currentRunId: string | null = null;

  constructor(options: MigrationOrchestratorOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;

    const rules = options.rules ?? getMappingRules(options.source.platform, options.destination.platform);
    if (!rules) {
      throw new MigrationError(
        `No mapping rules available for ${options.source.platform} → ${options.destination.platform}`,
        'NO_MAPPING_RULES',
        'run',
        false,
      );
    }

    const correlations = new CorrelationMap(this.store);

    this.extraction = new ExtractionService({
      store: this.store,
      source: options.source,
      attachmentsDir: this.config.staging.attachmentsDir,
      logger: this.logger,
      onProgress: (progress) => this.emitProgress(progress.entityType, progress),
    });

    this.transformation = new TransformationEngine({
      store: this.store,
      correlations,
      rules,
      mappings: this.config.mappings,
      logger: this.logger,
    });

    this.loading = new LoadingService({
      store: this.store,
      destination: options.destination,
      correlations,
      batchSize: this.config.batchSize,
      maxRollbackRetries: this.config.maxRollbackRetries,
      logger: this.logger,
      onProgress: (progress) => this.emitProgress(progress.entityType, progress),
    });
  }

  // ─── Public API ────────────────────────────────────────────

  /**
   * Run the full pipeline, creating a run unless one is given.
   */
  async run(runId?: string): Promise<MigrationReport> {
    const id = runId ?? this.createRun().id;
    return this.execute(id, FULL, true);
  }

  /**
   * Extract every selected type without transforming or loading.
   */
  async extract(runId?: string): Promise<MigrationReport> {
    const id = runId ?? this.createRun().id;
    return this.execute(id, { extract: true, transform: false, load: false }, false);
  }

  /**
   * One transformation pass per type over what has been staged so far.
   * Entities whose parents are not loaded yet stay `staged`.
   */
  async transform(runId: string): Promise<MigrationReport> {
    return this.execute(runId, { extract: false, transform: true, load: false }, false);
  }

  /**
   * Load staged and transformed entities of every fully extracted type,
   * transforming dependents as their parents are loaded.
   */
  async load(runId: string): Promise<MigrationReport> {
    return this.execute(runId, { extract: false, transform: true, load: true }, true);
  }

  /**
   * Continue an interrupted or partially completed run.
   */
  async resume(runId: string, options: ResumeOptions = {}): Promise<MigrationReport> {
    this.store.requireRun(runId);
    if (options.retryFailed) {
      const reset = this.store.resetFailed(runId);
      this.logger.info(
        `Reset ${reset.entities} failed entit${reset.entities === 1 ? 'y' : 'ies'}` +
          (reset.types.length > 0 ? `; reopened ${reset.types.join(', ')}` : ''),
      );
    }
    return this.execute(runId, FULL, true);
  }

  /**
   * Request cancellation. The current page or batch finishes first; the run
   * ends `aborted` and stays resumable.
   */
  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.logger.warn('Cancellation requested; finishing the current page or batch');
      this.controller.abort();
    }
  }

  /**
   * Subscribe to migration events.
   */
  on(handler: MigrationEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      const index = this.eventHandlers.indexOf(handler);
      if (index >= 0) this.eventHandlers.splice(index, 1);
    };
  }

  /** ID of the run being executed, if any. */
  get activeRunId(): string | null {
    return this.currentRunId;
  }

  // ─── Execution ─────────────────────────────────────────────

  private createRun(): MigrationRun {
    const run = this.store.createRun(this.config.source.projectKey, this.config.entityTypes ?? ENTITY_TYPES);
    this.logger.info(`Created run ${run.id} for project ${run.projectKey}`);
    return run;
  }

  private async execute(runId: string, steps: TypeSteps, finalize: boolean): Promise<MigrationReport> {
    this.store.requireRun(runId);
    this.controller = new AbortController();
    this.currentRunId = runId;
    this.store.updateRun(runId, { status: 'running', error: null, completedAt: null });

    try {
      for (const checkpoint of this.store.listCheckpoints(runId)) {
        if (this.controller.signal.aborted) break;
        await this.processType(runId, checkpoint.entityType, steps);
      }

      if (this.controller.signal.aborted) {
        this.store.updateRun(runId, { status: 'aborted', error: 'cancelled' });
        this.logger.warn(`Run ${runId} cancelled; resume it with --run ${runId}`);
      } else if (finalize) {
        this.finish(runId);
      } else if (this.store.listCheckpoints(runId).some((c) => c.status === 'failed' || c.status === 'skipped')) {
        this.store.updateRun(runId, { status: 'partially-completed' });
      }

      const report = buildReport(this.store, runId);
      this.emit({ type: 'complete', runId, data: report });
      return report;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.store.updateRun(runId, { status: 'aborted', error: error.message });
      this.emit({ type: 'error', runId, error });
      throw err;
    } finally {
      this.currentRunId = null;
    }
  }

  private async processType(runId: string, type: EntityType, steps: TypeSteps): Promise<void> {
    const checkpoint = this.store.getCheckpoint(runId, type);
    if (checkpoint.status === 'completed' || checkpoint.status === 'failed' || checkpoint.status === 'skipped') {
      return;
    }

    this.emit({ type: 'type:start', runId, entityType: type });
    const signal = this.controller.signal;

    if (steps.extract && this.extraction.needsExtraction(runId, type)) {
      this.setPhase(runId, 'extracting', type);
      const result = await this.extraction.extractType(runId, type, signal);
      this.emit({ type: 'phase:complete', runId, phase: 'extracting', entityType: type, data: result });

      if (result.outcome === 'failed') {
        this.skipDependents(runId, type, result.error ?? 'extraction failed');
        this.emit({ type: 'type:complete', runId, entityType: type, data: this.store.getCheckpoint(runId, type) });
        return;
      }
      if (result.outcome === 'cancelled') return;

      this.store.updateCheckpoint(runId, type, { status: 'extracted' });
      this.emit({ type: 'checkpoint', runId, entityType: type, message: `${type} extracted` });
    }

    if (steps.transform && !steps.load) {
      this.setPhase(runId, 'transforming', type);
      const result = this.transformation.transformPass(runId, type);
      this.emit({ type: 'phase:complete', runId, phase: 'transforming', entityType: type, data: result });
    }

    if (steps.load && this.store.getCheckpoint(runId, type).extractDone) {
      const converged = await this.converge(runId, type, signal);
      if (converged === null) return;
      this.settleType(runId, type, converged);
    }

    this.emit({ type: 'type:complete', runId, entityType: type, data: this.store.getCheckpoint(runId, type) });
  }

  /**
   * Alternate transform and load passes until a round changes nothing.
   * Rounds that settle entities (loaded or failed) always count as progress,
   * so a deep same-type hierarchy converges one level per round. Only
   * `maxFixedPointIterations` consecutive rounds without a settled entity
   * stop the loop early. Returns whether a fixed point was reached, or null
   * when cancelled.
   */
  private async converge(runId: string, type: EntityType, signal: AbortSignal): Promise<boolean | null> {
    const cap = this.config.maxFixedPointIterations;
    let stalled = 0;

    for (let round = 1; ; round++) {
      this.setPhase(runId, 'transforming', type);
      const transformed = this.transformation.transformPass(runId, type);

      this.setPhase(runId, 'loading', type);
      const loaded = await this.loading.loadPass(runId, type, signal);
      this.emit({ type: 'checkpoint', runId, entityType: type, message: `${type} round ${round}`, data: loaded });

      if (loaded.cancelled) return null;

      const settled = transformed.failed + loaded.loaded + loaded.failed;
      if (settled + transformed.transformed === 0) return true;

      stalled = settled > 0 ? 0 : stalled + 1;
      if (stalled >= cap) {
        this.logger.warn(`${type}: no entity settled in ${cap} consecutive round(s)`);
        return false;
      }
    }
  }

  /**
   * Fail whatever is still `staged` after the fixed point and close the type.
   */
  private settleType(runId: string, type: EntityType, converged: boolean): void {
    const reason = converged
      ? 'Dependencies were never loaded'
      : `Did not converge: no progress in ${this.config.maxFixedPointIterations} consecutive round(s)`;
    const error = new UnresolvedDependencyError(reason);
    let stranded = this.store.failRemaining(runId, type, 'staged', error.code, error.message);
    if (!converged) {
      stranded += this.store.failRemaining(runId, type, 'transformed', error.code, error.message);
    }
    if (stranded > 0) {
      this.logger.warn(`${type}: ${stranded} entit${stranded === 1 ? 'y' : 'ies'} left unresolved`);
    }
    this.store.updateCheckpoint(runId, type, { status: 'completed', error: null });
  }

  private skipDependents(runId: string, failed: EntityType, reason: string): void {
    for (const dependent of dependentsOf(failed)) {
      const checkpoint = this.store.findCheckpoint(runId, dependent);
      if (!checkpoint || checkpoint.status === 'completed') continue;
      this.store.updateCheckpoint(runId, dependent, {
        status: 'skipped',
        error: `${failed} failed: ${reason}`,
      });
      this.logger.warn(`${dependent}: skipped because ${failed} failed`);
    }
  }

  private finish(runId: string): void {
    const checkpoints = this.store.listCheckpoints(runId);
    const counts = this.store.countByStatus(runId);
    const settled = checkpoints.every((c) => c.status === 'completed' || c.status === 'failed' || c.status === 'skipped');
    const clean = checkpoints.every((c) => c.status === 'completed') && counts.failed === 0;

    const status: RunStatus = clean ? 'completed' : 'partially-completed';
    if (settled) {
      this.store.updateRun(runId, { status, phase: 'complete', completedAt: new Date().toISOString() });
      this.emit({ type: 'phase:complete', runId, phase: 'complete', message: `Run ${status}` });
    } else {
      this.store.updateRun(runId, { status: 'partially-completed' });
    }
  }

  // ─── Helpers ───────────────────────────────────────────────

  private setPhase(runId: string, phase: ActivePhase, entityType: EntityType): void {
    this.store.updateRun(runId, { phase });
    this.store.updateCheckpoint(runId, entityType, { status: phase });
    this.emit({ type: 'phase:start', runId, phase, entityType });
  }

  private emitProgress(entityType: EntityType, progress: ProgressCounts): void {
    if (this.currentRunId) {
      this.emit({ type: 'progress', runId: this.currentRunId, entityType, progress });
    }
  }

  private emit(event: MigrationEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err) {
        this.logger.debug(`Event handler failed on ${event.type}: ${errorMessage(err)}`);
      }
    }
  }
}
