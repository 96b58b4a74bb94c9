/**
 * Test-Management Migration
 *
 * Zephyr Scale → qTest Manager.
 * Extract → Transform → Load
 */

// Core types
export type {
  EntityType,
  EntityStatus,
  EntityReference,
  SourceEntity,
  StagedItem,
  CorrelationEntry,
  TransformedPayload,
  TransformedEntity,
  DestinationPayloads,
  Checkpoint,
  TypeStatus,
  MigrationRun,
  RunStatus,
  MigrationPhase,
  JournalEntry,
  SourceAdapter,
  SourcePage,
  DestinationAdapter,
  AttachmentDescriptor,
  AttachmentOwner,
  StatusCounts,
  FailureRecord,
  TypeReport,
  MigrationReport,
} from './types.js';
export { ENTITY_TYPES } from './types.js';

// Orchestrator
export {
  MigrationOrchestrator,
  type MigrationEvent,
  type MigrationEventType,
  type MigrationEventHandler,
  type MigrationOrchestratorOptions,
  type ProgressCounts,
  type ResumeOptions,
} from './orchestrator.js';

// Services
export { ExtractionService, type ExtractResult, type ExtractProgress } from './extract/extraction-service.js';
export { TransformationEngine, type TransformPassResult } from './transform/transformation-engine.js';
export { LoadingService, type LoadPassResult, type LoadProgress } from './load/loading-service.js';

// Staging
export { StagingStore, type StagingStoreOptions } from './staging/store.js';
export { CorrelationMap } from './staging/correlation-map.js';

// Adapters
export { ZephyrSource, createZephyrSource, zephyrPageAdapter, deriveReferences } from './source/zephyr.js';
export { QTestDestination, createQTestDestination } from './destination/qtest.js';
export { ApiClient, type ClientRuntime, type PageAdapter } from './http/api-client.js';

// Mapping rules
export {
  registerMappingRules,
  registerMappingRule,
  getMappingRules,
  clearMappingRuleOverrides,
  listMappingRules,
  type MappingRule,
  type MappingRuleSet,
  type MappingContext,
} from './transform/rules/registry.js';
export { validateTransformed } from './transform/validation.js';

// Reports
export { buildReport } from './report.js';
export { validateRun, type RunValidation, type ValidationIssue } from './validation.js';

// Errors
export * from './errors.js';
