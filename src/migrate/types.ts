/**
 * Migration Types
 *
 * Defines the core types for the three-phase migration pipeline:
 * Extract → Transform → Load
 */

// ─── Entity Types ────────────────────────────────────────────

/** Entity types in fixed dependency order. */
export const ENTITY_TYPES = ['folder', 'testCase', 'testCycle', 'testExecution', 'attachment'] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const ENTITY_STATUSES = ['pending', 'staged', 'transformed', 'loaded', 'failed'] as const;

export type EntityStatus = (typeof ENTITY_STATUSES)[number];

/**
 * A relationship from one staged entity to another, by source ID.
 */
export interface EntityReference {
  /** Role of the reference within the payload (e.g. "parent", "testCase") */
  role: string;
  entityType: EntityType;
  sourceId: string;
}

// ─── Staged Source Entities ──────────────────────────────────

export interface SourceEntity {
  runId: string;
  entityType: EntityType;
  /** Source-system ID, unique per run and entity type */
  sourceId: string;
  /** Raw payload as returned by the source API */
  payload: Record<string, unknown>;
  references: EntityReference[];
  extractedAt: string;
  status: EntityStatus;
  /** Destination-shaped payload, present while status is `transformed` */
  transformed?: TransformedPayload;
  failureReason?: string;
  failureCode?: string;
  /** Load attempts consumed by rollbacks */
  attempts: number;
  updatedAt: string;
}

/** Item returned by a source page, before it is staged. */
export interface StagedItem {
  sourceId: string;
  payload: Record<string, unknown>;
  references: EntityReference[];
}

// ─── Correlation Map ─────────────────────────────────────────

export interface CorrelationEntry {
  entityType: EntityType;
  sourceId: string;
  destinationId: string;
  runId: string;
  createdAt: string;
}

// ─── Destination Payloads ────────────────────────────────────

export interface QTestProperty {
  field_id: number;
  field_value: string | number | boolean;
}

export interface ModulePayload {
  name: string;
  description?: string;
  parentId?: string;
}

export interface TestStepPayload {
  description: string;
  expected: string;
  order: number;
}

export interface TestCasePayload {
  name: string;
  description?: string;
  precondition?: string;
  parentId?: string;
  properties: QTestProperty[];
  testSteps: TestStepPayload[];
}

export interface TestCyclePayload {
  name: string;
  description?: string;
  parentId?: string;
  plannedStartDate?: string;
  plannedEndDate?: string;
  properties: QTestProperty[];
}

export interface TestStepLogPayload {
  order: number;
  status: string;
  actualResult: string;
}

export interface TestRunPayload {
  run: {
    name: string;
    testCaseId: string;
    testCycleId: string;
    properties: QTestProperty[];
  };
  log: {
    status: string;
    executionStartDate: string;
    executionEndDate: string;
    note?: string;
    stepLogs: TestStepLogPayload[];
  };
}

export type AttachmentOwnerType = 'test-cases' | 'test-runs';

export interface AttachmentPayload {
  ownerType: AttachmentOwnerType;
  ownerId: string;
  filename: string;
  contentType: string;
  localPath: string;
}

/** Destination payload for each entity type. */
export interface DestinationPayloads {
  folder: ModulePayload;
  testCase: TestCasePayload;
  testCycle: TestCyclePayload;
  testExecution: TestRunPayload;
  attachment: AttachmentPayload;
}

/** Discriminated union of destination payloads, tagged by entity type. */
export type TransformedPayload = {
  [K in EntityType]: { entityType: K; payload: DestinationPayloads[K] };
}[EntityType];

/** A destination-shaped entity with a back-reference to its source. */
export type TransformedEntity = TransformedPayload & {
  runId: string;
  sourceId: string;
};

// ─── Checkpoints ─────────────────────────────────────────────

export const TYPE_STATUSES = [
  'pending',
  'extracting',
  'extracted',
  'transforming',
  'loading',
  'completed',
  'failed',
  'skipped',
] as const;

export type TypeStatus = (typeof TYPE_STATUSES)[number];

export interface Checkpoint {
  runId: string;
  entityType: EntityType;
  /** Cursor of the next page to fetch (null before the first page) */
  extractCursor: string | null;
  extractDone: boolean;
  pagesFetched: number;
  itemsStaged: number;
  lastTransformedSourceId: string | null;
  lastLoadedSourceId: string | null;
  status: TypeStatus;
  error: string | null;
  updatedAt: string;
}

// ─── Migration Runs ──────────────────────────────────────────

export const RUN_STATUSES = ['created', 'running', 'completed', 'partially-completed', 'aborted'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export const MIGRATION_PHASES = ['pending', 'extracting', 'transforming', 'loading', 'complete'] as const;

export type MigrationPhase = (typeof MIGRATION_PHASES)[number];

export interface MigrationRun {
  id: string;
  projectKey: string;
  status: RunStatus;
  phase: MigrationPhase;
  startedAt: string;
  updatedAt: string;
  completedAt: string | null;
  error: string | null;
}

// ─── Load Journal ────────────────────────────────────────────

export interface JournalEntry {
  runId: string;
  entityType: EntityType;
  sourceId: string;
  destinationId: string;
  batchId: string;
  payload: TransformedPayload;
}

// ─── Adapters ────────────────────────────────────────────────

export interface SourcePage {
  items: StagedItem[];
  /** Cursor for the next page, or null when the listing is exhausted */
  nextCursor: string | null;
}

export interface AttachmentDescriptor {
  id: string;
  filename: string;
  contentType: string;
  size?: number;
}

export interface AttachmentOwner {
  entityType: 'testCase' | 'testExecution';
  sourceId: string;
  /** Key used by the source API for the owner path (falls back to the ID) */
  key: string;
}

/**
 * Source adapter.
 *
 * Pulls pages of one entity type and attachment binaries from the source platform.
 */
export interface SourceAdapter {
  readonly platform: string;

  /** Fetch one page of a listable entity type. */
  fetchPage(entityType: Exclude<EntityType, 'attachment'>, cursor: string | null): Promise<SourcePage>;

  /** List attachments of one owner entity. */
  listAttachments(owner: AttachmentOwner): Promise<AttachmentDescriptor[]>;

  /** Stream one attachment's content to a local file. Returns bytes written. */
  downloadAttachment(attachmentId: string, filePath: string): Promise<number>;
}

/**
 * Destination adapter.
 *
 * Creates entities on the destination platform and removes them on rollback.
 */
export interface DestinationAdapter {
  readonly platform: string;

  /** Create one entity and return its destination ID. */
  create(entity: TransformedEntity): Promise<string>;

  /** Compensating delete for a previously created entity. */
  remove(entity: TransformedPayload, destinationId: string): Promise<void>;
}

// ─── Reports ─────────────────────────────────────────────────

export type StatusCounts = Record<EntityStatus, number>;

export interface FailureRecord {
  entityType: EntityType;
  sourceId: string;
  code: string;
  reason: string;
}

export interface TypeReport {
  entityType: EntityType;
  status: TypeStatus;
  counts: StatusCounts;
  error: string | null;
}

export interface MigrationReport {
  runId: string;
  projectKey: string;
  status: RunStatus;
  generatedAt: string;
  types: TypeReport[];
  totals: StatusCounts;
  failures: FailureRecord[];
}
