/**
 * Durable Staging Store
 *
 * SQLite file holding runs, staged source entities, checkpoints, the
 * correlation map and the load journal. better-sqlite3 is synchronous, so
 * every method here completes its write before returning; multi-row writes
 * that must land together go through `transaction`.
 */

import { randomBytes } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';
import { z } from 'zod';

import { IntegrityError, MigrationError } from '../errors.js';
import { parseRecord } from '../json.js';
import {
  ENTITY_STATUSES,
  ENTITY_TYPES,
  MIGRATION_PHASES,
  RUN_STATUSES,
  TYPE_STATUSES,
  type Checkpoint,
  type CorrelationEntry,
  type EntityStatus,
  type EntityType,
  type FailureRecord,
  type JournalEntry,
  type MigrationRun,
  type SourceEntity,
  type StagedItem,
  type StatusCounts,
  type TransformedPayload,
} from '../types.js';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';

// ─── Row Shapes ──────────────────────────────────────────────

interface RunRow {
  id: string;
  project_key: string;
  status: string;
  phase: string;
  started_at: string;
  updated_at: string;
  completed_at: string | null;
  error: string | null;
}

interface EntityRow {
  seq: number;
  run_id: string;
  entity_type: string;
  source_id: string;
  payload: string;
  refs: string;
  extracted_at: string;
  status: string;
  transformed: string | null;
  failure_reason: string | null;
  failure_code: string | null;
  attempts: number;
  updated_at: string;
}

interface CheckpointRow {
  run_id: string;
  entity_type: string;
  extract_cursor: string | null;
  extract_done: number;
  pages_fetched: number;
  items_staged: number;
  last_transformed_source_id: string | null;
  last_loaded_source_id: string | null;
  status: string;
  error: string | null;
  updated_at: string;
}

interface CorrelationRow {
  seq: number;
  entity_type: string;
  source_id: string;
  destination_id: string;
  run_id: string;
  created_at: string;
}

interface JournalRow {
  run_id: string;
  entity_type: string;
  source_id: string;
  destination_id: string;
  batch_id: string;
  payload: string;
}

// ─── Public Shapes ───────────────────────────────────────────

/** A correlation entry with its insertion order. */
export interface StoredCorrelation extends CorrelationEntry {
  seq: number;
}

export type RunPatch = Partial<Pick<MigrationRun, 'status' | 'phase' | 'error' | 'completedAt'>>;

export type CheckpointPatch = Partial<Omit<Checkpoint, 'runId' | 'entityType' | 'updatedAt'>>;

export interface StagePageProgress {
  /** Cursor to resume from after this page */
  cursor: string | null;
  /** True when this was the last page */
  done: boolean;
}

export interface LoadedResult {
  sourceId: string;
  destinationId: string;
}

export interface ResetSummary {
  entities: number;
  types: EntityType[];
}

export interface StagingStoreOptions {
  /** Database file path, or ":memory:" */
  path: string;
  now?: () => Date;
}

const ReferencesSchema = z.array(
  z.object({
    role: z.string(),
    entityType: z.enum(ENTITY_TYPES),
    sourceId: z.string(),
  }),
);

// ─── Store ───────────────────────────────────────────────────

export class StagingStore {
  private readonly db: Database.Database;
  private readonly clock: () => Date;

  constructor(options: StagingStoreOptions) {
    const inMemory = options.path === ':memory:';
    if (!inMemory) {
      mkdirSync(dirname(options.path), { recursive: true });
    }

    this.db = new Database(options.path);
    this.clock = options.now ?? (() => new Date());

    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = FULL');
    this.db.pragma('foreign_keys = ON');
    this.migrate();
  }

  /** Store backed by a private in-memory database. */
  static inMemory(now?: () => Date): StagingStore {
    return new StagingStore({ path: ':memory:', now });
  }

  close(): void {
    this.db.close();
  }

  /**
   * Run `fn` in one SQLite transaction. Nested calls join the outer one.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private migrate(): void {
    this.db.exec(SCHEMA_SQL);
    const row = this.db.prepare<[], { version: number }>('SELECT version FROM schema_info LIMIT 1').get();
    if (!row) {
      this.db.prepare('INSERT INTO schema_info (version) VALUES (?)').run(SCHEMA_VERSION);
    } else if (row.version > SCHEMA_VERSION) {
      throw new MigrationError(
        `Staging store schema v${row.version} is newer than supported v${SCHEMA_VERSION}`,
        'STORE_VERSION',
        'run',
        false,
      );
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // ─── Runs ──────────────────────────────────────────────────

  /**
   * Create a run with a pending checkpoint for each selected entity type.
   */
  createRun(projectKey: string, entityTypes: readonly EntityType[] = ENTITY_TYPES): MigrationRun {
    const id = `run_${randomBytes(6).toString('hex')}`;
    const now = this.now();

    this.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO migration_runs (id, project_key, status, phase, started_at, updated_at)
           VALUES (?, ?, 'created', 'pending', ?, ?)`,
        )
        .run(id, projectKey, now, now);

      const insertCheckpoint = this.db.prepare(
        `INSERT INTO checkpoints (run_id, entity_type, status, updated_at) VALUES (?, ?, 'pending', ?)`,
      );
      for (const type of ENTITY_TYPES) {
        if (entityTypes.includes(type)) insertCheckpoint.run(id, type, now);
      }
    });

    return this.requireRun(id);
  }

  getRun(id: string): MigrationRun | undefined {
    const row = this.db.prepare<[string], RunRow>('SELECT * FROM migration_runs WHERE id = ?').get(id);
    return row ? toRun(row) : undefined;
  }

  requireRun(id: string): MigrationRun {
    const run = this.getRun(id);
    if (!run) {
      throw new MigrationError(`Unknown migration run: ${id}`, 'RUN_NOT_FOUND', 'run', false);
    }
    return run;
  }

  /** Most recently started run, if any. */
  latestRun(): MigrationRun | undefined {
    const row = this.db
      .prepare<[], RunRow>('SELECT * FROM migration_runs ORDER BY started_at DESC, rowid DESC LIMIT 1')
      .get();
    return row ? toRun(row) : undefined;
  }

  listRuns(): MigrationRun[] {
    return this.db
      .prepare<[], RunRow>('SELECT * FROM migration_runs ORDER BY started_at, rowid')
      .all()
      .map(toRun);
  }

  updateRun(id: string, patch: RunPatch): MigrationRun {
    const next = { ...this.requireRun(id), ...patch, updatedAt: this.now() };
    this.db
      .prepare(
        `UPDATE migration_runs
         SET status = ?, phase = ?, updated_at = ?, completed_at = ?, error = ?
         WHERE id = ?`,
      )
      .run(next.status, next.phase, next.updatedAt, next.completedAt, next.error, id);
    return next;
  }

  // ─── Checkpoints ───────────────────────────────────────────

  findCheckpoint(runId: string, type: EntityType): Checkpoint | undefined {
    const row = this.db
      .prepare<[string, string], CheckpointRow>('SELECT * FROM checkpoints WHERE run_id = ? AND entity_type = ?')
      .get(runId, type);
    return row ? toCheckpoint(row) : undefined;
  }

  getCheckpoint(runId: string, type: EntityType): Checkpoint {
    const checkpoint = this.findCheckpoint(runId, type);
    if (!checkpoint) {
      throw new MigrationError(`Entity type ${type} is not part of run ${runId}`, 'TYPE_NOT_IN_RUN', 'type', false);
    }
    return checkpoint;
  }

  /** Checkpoints of the run's selected types, in dependency order. */
  listCheckpoints(runId: string): Checkpoint[] {
    const rows = this.db.prepare<[string], CheckpointRow>('SELECT * FROM checkpoints WHERE run_id = ?').all(runId);
    return rows.map(toCheckpoint).sort((a, b) => typeIndex(a.entityType) - typeIndex(b.entityType));
  }

  updateCheckpoint(runId: string, type: EntityType, patch: CheckpointPatch): Checkpoint {
    const next = { ...this.getCheckpoint(runId, type), ...patch, updatedAt: this.now() };
    this.db
      .prepare(
        `UPDATE checkpoints
         SET extract_cursor = ?, extract_done = ?, pages_fetched = ?, items_staged = ?,
             last_transformed_source_id = ?, last_loaded_source_id = ?, status = ?, error = ?, updated_at = ?
         WHERE run_id = ? AND entity_type = ?`,
      )
      .run(
        next.extractCursor,
        next.extractDone ? 1 : 0,
        next.pagesFetched,
        next.itemsStaged,
        next.lastTransformedSourceId,
        next.lastLoadedSourceId,
        next.status,
        next.error,
        next.updatedAt,
        runId,
        type,
      );
    return next;
  }

  // ─── Staging ───────────────────────────────────────────────

  /**
   * Stage one page of items and advance the extraction checkpoint in the
   * same transaction. Items already staged for this run are left untouched.
   * Returns the number of newly staged items.
   */
  stagePage(runId: string, type: EntityType, items: StagedItem[], progress: StagePageProgress): number {
    return this.transaction(() => {
      const now = this.now();
      const insert = this.db.prepare(
        `INSERT INTO source_entities
           (run_id, entity_type, source_id, payload, refs, extracted_at, status, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, 'staged', ?)
         ON CONFLICT (run_id, entity_type, source_id) DO NOTHING`,
      );

      let inserted = 0;
      for (const item of items) {
        const result = insert.run(
          runId,
          type,
          item.sourceId,
          JSON.stringify(item.payload),
          JSON.stringify(item.references),
          now,
          now,
        );
        inserted += result.changes;
      }

      const checkpoint = this.getCheckpoint(runId, type);
      this.updateCheckpoint(runId, type, {
        extractCursor: progress.cursor,
        extractDone: progress.done,
        pagesFetched: checkpoint.pagesFetched + 1,
        itemsStaged: checkpoint.itemsStaged + inserted,
        status: progress.done ? 'extracted' : 'extracting',
      });
      return inserted;
    });
  }

  getEntity(runId: string, type: EntityType, sourceId: string): SourceEntity | undefined {
    const row = this.db
      .prepare<[string, string, string], EntityRow>(
        'SELECT * FROM source_entities WHERE run_id = ? AND entity_type = ? AND source_id = ?',
      )
      .get(runId, type, sourceId);
    return row ? toEntity(row) : undefined;
  }

  /**
   * Entities of one type in staging order, optionally filtered by status.
   */
  listEntities(runId: string, type: EntityType, status?: EntityStatus, limit = -1): SourceEntity[] {
    const rows = status
      ? this.db
          .prepare<[string, string, string, number], EntityRow>(
            `SELECT * FROM source_entities WHERE run_id = ? AND entity_type = ? AND status = ?
             ORDER BY seq LIMIT ?`,
          )
          .all(runId, type, status, limit)
      : this.db
          .prepare<[string, string, number], EntityRow>(
            'SELECT * FROM source_entities WHERE run_id = ? AND entity_type = ? ORDER BY seq LIMIT ?',
          )
          .all(runId, type, limit);
    return rows.map(toEntity);
  }

  countByStatus(runId: string, type?: EntityType): StatusCounts {
    const counts = emptyCounts();
    const rows = type
      ? this.db
          .prepare<[string, string], { status: string; n: number }>(
            `SELECT status, COUNT(*) AS n FROM source_entities
             WHERE run_id = ? AND entity_type = ? GROUP BY status`,
          )
          .all(runId, type)
      : this.db
          .prepare<[string], { status: string; n: number }>(
            'SELECT status, COUNT(*) AS n FROM source_entities WHERE run_id = ? GROUP BY status',
          )
          .all(runId);
    for (const row of rows) {
      counts[member(ENTITY_STATUSES, row.status, 'entity status')] += row.n;
    }
    return counts;
  }

  /** Replace the source payload of a staged entity. */
  updatePayload(runId: string, type: EntityType, sourceId: string, payload: Record<string, unknown>): void {
    this.db
      .prepare(
        `UPDATE source_entities SET payload = ?, updated_at = ?
         WHERE run_id = ? AND entity_type = ? AND source_id = ?`,
      )
      .run(JSON.stringify(payload), this.now(), runId, type, sourceId);
  }

  markTransformed(runId: string, type: EntityType, sourceId: string, transformed: TransformedPayload): void {
    this.transaction(() => {
      this.db
        .prepare(
          `UPDATE source_entities
           SET status = 'transformed', transformed = ?, failure_reason = NULL, failure_code = NULL, updated_at = ?
           WHERE run_id = ? AND entity_type = ? AND source_id = ?`,
        )
        .run(JSON.stringify(transformed), this.now(), runId, type, sourceId);
      this.updateCheckpoint(runId, type, { lastTransformedSourceId: sourceId });
    });
  }

  markFailed(runId: string, type: EntityType, sourceId: string, code: string, reason: string): void {
    this.db
      .prepare(
        `UPDATE source_entities
         SET status = 'failed', transformed = NULL, failure_code = ?, failure_reason = ?, updated_at = ?
         WHERE run_id = ? AND entity_type = ? AND source_id = ?`,
      )
      .run(code, reason, this.now(), runId, type, sourceId);
  }

  /**
   * Fail every entity of a type still in `status`. Returns the number affected.
   */
  failRemaining(runId: string, type: EntityType, status: EntityStatus, code: string, reason: string): number {
    const result = this.db
      .prepare(
        `UPDATE source_entities
         SET status = 'failed', transformed = NULL, failure_code = ?, failure_reason = ?, updated_at = ?
         WHERE run_id = ? AND entity_type = ? AND status = ?`,
      )
      .run(code, reason, this.now(), runId, type, status);
    return result.changes;
  }

  /**
   * Put entities back to `transformed` after a rolled-back batch, counting
   * the attempt against the rollback budget.
   */
  revertToTransformed(runId: string, type: EntityType, sourceIds: string[]): void {
    this.transaction(() => {
      const update = this.db.prepare(
        `UPDATE source_entities SET status = 'transformed', attempts = attempts + 1, updated_at = ?
         WHERE run_id = ? AND entity_type = ? AND source_id = ? AND transformed IS NOT NULL`,
      );
      const now = this.now();
      for (const sourceId of sourceIds) {
        update.run(now, runId, type, sourceId);
      }
    });
  }

  /**
   * Commit a load batch: record correlations, mark entities loaded, clear
   * their journal rows and advance the checkpoint, all in one transaction.
   */
  commitLoaded(runId: string, type: EntityType, results: LoadedResult[]): CorrelationEntry[] {
    if (results.length === 0) return [];

    return this.transaction(() => {
      const now = this.now();
      const markLoaded = this.db.prepare(
        `UPDATE source_entities SET status = 'loaded', transformed = NULL, failure_code = NULL,
           failure_reason = NULL, updated_at = ?
         WHERE run_id = ? AND entity_type = ? AND source_id = ?`,
      );
      const clearJournal = this.db.prepare(
        'DELETE FROM load_journal WHERE run_id = ? AND entity_type = ? AND source_id = ?',
      );

      const entries = results.map((result) => {
        const entry = this.insertCorrelation({
          entityType: type,
          sourceId: result.sourceId,
          destinationId: result.destinationId,
          runId,
        });
        markLoaded.run(now, runId, type, result.sourceId);
        clearJournal.run(runId, type, result.sourceId);
        return entry;
      });

      this.updateCheckpoint(runId, type, { lastLoadedSourceId: results[results.length - 1].sourceId });
      return entries;
    });
  }

  /**
   * Return failed entities to `staged` and reopen the types that need
   * another pass. Loaded entities are not touched.
   */
  resetFailed(runId: string): ResetSummary {
    return this.transaction(() => {
      const now = this.now();
      const touched = this.db
        .prepare<[string], { entity_type: string }>(
          `SELECT DISTINCT entity_type FROM source_entities WHERE run_id = ? AND status = 'failed'`,
        )
        .all(runId)
        .map((row) => member(ENTITY_TYPES, row.entity_type, 'entity type'));

      const entities = this.db
        .prepare(
          `UPDATE source_entities
           SET status = 'staged', transformed = NULL, failure_code = NULL, failure_reason = NULL,
               attempts = 0, updated_at = ?
           WHERE run_id = ? AND status = 'failed'`,
        )
        .run(now, runId).changes;

      const reopened: EntityType[] = [];
      for (const checkpoint of this.listCheckpoints(runId)) {
        if (checkpoint.status === 'failed' || checkpoint.status === 'skipped') {
          this.updateCheckpoint(runId, checkpoint.entityType, { status: 'pending', error: null });
          reopened.push(checkpoint.entityType);
        } else if (touched.includes(checkpoint.entityType) && checkpoint.status === 'completed') {
          this.updateCheckpoint(runId, checkpoint.entityType, { status: 'extracted', error: null });
          reopened.push(checkpoint.entityType);
        }
      }

      return { entities, types: reopened };
    });
  }

  listFailures(runId: string): FailureRecord[] {
    const rows = this.db
      .prepare<[string], EntityRow>(`SELECT * FROM source_entities WHERE run_id = ? AND status = 'failed' ORDER BY seq`)
      .all(runId);
    return rows
      .map(toEntity)
      .sort((a, b) => typeIndex(a.entityType) - typeIndex(b.entityType))
      .map((entity) => ({
        entityType: entity.entityType,
        sourceId: entity.sourceId,
        code: entity.failureCode ?? 'UNKNOWN',
        reason: entity.failureReason ?? '',
      }));
  }

  // ─── Correlation Map ───────────────────────────────────────

  findCorrelation(type: EntityType, sourceId: string): StoredCorrelation | undefined {
    const row = this.db
      .prepare<[string, string], CorrelationRow>(
        'SELECT * FROM correlation_entries WHERE entity_type = ? AND source_id = ?',
      )
      .get(type, sourceId);
    return row ? toCorrelation(row) : undefined;
  }

  /**
   * Insert-or-ignore. Returns the stored entry, which is the earlier one
   * when the key was already correlated.
   */
  insertCorrelation(entry: Omit<CorrelationEntry, 'createdAt'>): StoredCorrelation {
    this.db
      .prepare(
        `INSERT INTO correlation_entries (entity_type, source_id, destination_id, run_id, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (entity_type, source_id) DO NOTHING`,
      )
      .run(entry.entityType, entry.sourceId, entry.destinationId, entry.runId, this.now());

    const stored = this.findCorrelation(entry.entityType, entry.sourceId);
    if (!stored) {
      throw new IntegrityError(`Correlation for ${entry.entityType}/${entry.sourceId} was not stored`);
    }
    return stored;
  }

  /** Correlations in insertion order, optionally only those a run created. */
  listCorrelations(runId?: string): StoredCorrelation[] {
    const rows = runId
      ? this.db
          .prepare<[string], CorrelationRow>('SELECT * FROM correlation_entries WHERE run_id = ? ORDER BY seq')
          .all(runId)
      : this.db.prepare<[], CorrelationRow>('SELECT * FROM correlation_entries ORDER BY seq').all();
    return rows.map(toCorrelation);
  }

  // ─── Load Journal ──────────────────────────────────────────

  addJournal(entry: JournalEntry): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO load_journal
           (run_id, entity_type, source_id, destination_id, batch_id, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.runId,
        entry.entityType,
        entry.sourceId,
        entry.destinationId,
        entry.batchId,
        JSON.stringify(entry.payload),
        this.now(),
      );
  }

  removeJournal(runId: string, type: EntityType, sourceId: string): void {
    this.db
      .prepare('DELETE FROM load_journal WHERE run_id = ? AND entity_type = ? AND source_id = ?')
      .run(runId, type, sourceId);
  }

  listJournal(runId: string, type?: EntityType): JournalEntry[] {
    const rows = type
      ? this.db
          .prepare<[string, string], JournalRow>(
            'SELECT * FROM load_journal WHERE run_id = ? AND entity_type = ? ORDER BY rowid',
          )
          .all(runId, type)
      : this.db.prepare<[string], JournalRow>('SELECT * FROM load_journal WHERE run_id = ? ORDER BY rowid').all(runId);
    return rows.map(toJournal);
  }
}

// ─── Row Mapping ─────────────────────────────────────────────

function member<T extends string>(values: readonly T[], value: string, label: string): T {
  const found = values.find((candidate) => candidate === value);
  if (found === undefined) {
    throw new IntegrityError(`Unknown ${label} "${value}" in staging store`);
  }
  return found;
}

function typeIndex(type: EntityType): number {
  return ENTITY_TYPES.indexOf(type);
}

export function emptyCounts(): StatusCounts {
  return { pending: 0, staged: 0, transformed: 0, loaded: 0, failed: 0 };
}

function toRun(row: RunRow): MigrationRun {
  return {
    id: row.id,
    projectKey: row.project_key,
    status: member(RUN_STATUSES, row.status, 'run status'),
    phase: member(MIGRATION_PHASES, row.phase, 'run phase'),
    startedAt: row.started_at,
    updatedAt: row.updated_at,
    completedAt: row.completed_at,
    error: row.error,
  };
}

function toCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    runId: row.run_id,
    entityType: member(ENTITY_TYPES, row.entity_type, 'entity type'),
    extractCursor: row.extract_cursor,
    extractDone: row.extract_done === 1,
    pagesFetched: row.pages_fetched,
    itemsStaged: row.items_staged,
    lastTransformedSourceId: row.last_transformed_source_id,
    lastLoadedSourceId: row.last_loaded_source_id,
    status: member(TYPE_STATUSES, row.status, 'type status'),
    error: row.error,
    updatedAt: row.updated_at,
  };
}

function toEntity(row: EntityRow): SourceEntity {
  const entity: SourceEntity = {
    runId: row.run_id,
    entityType: member(ENTITY_TYPES, row.entity_type, 'entity type'),
    sourceId: row.source_id,
    payload: parseRecord(row.payload, `payload of ${row.entity_type}/${row.source_id}`),
    references: ReferencesSchema.parse(JSON.parse(row.refs)),
    extractedAt: row.extracted_at,
    status: member(ENTITY_STATUSES, row.status, 'entity status'),
    attempts: row.attempts,
    updatedAt: row.updated_at,
  };
  if (row.transformed !== null) entity.transformed = JSON.parse(row.transformed) as TransformedPayload;
  if (row.failure_reason !== null) entity.failureReason = row.failure_reason;
  if (row.failure_code !== null) entity.failureCode = row.failure_code;
  return entity;
}

function toCorrelation(row: CorrelationRow): StoredCorrelation {
  return {
    seq: row.seq,
    entityType: member(ENTITY_TYPES, row.entity_type, 'entity type'),
    sourceId: row.source_id,
    destinationId: row.destination_id,
    runId: row.run_id,
    createdAt: row.created_at,
  };
}

function toJournal(row: JournalRow): JournalEntry {
  return {
    runId: row.run_id,
    entityType: member(ENTITY_TYPES, row.entity_type, 'entity type'),
    sourceId: row.source_id,
    destinationId: row.destination_id,
    batchId: row.batch_id,
    payload: JSON.parse(row.payload) as TransformedPayload,
  };
}
