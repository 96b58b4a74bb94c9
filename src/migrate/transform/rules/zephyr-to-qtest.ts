/**
 * Zephyr Scale → qTest Mapping Rules
 *
 * folder → module, test case → test case, test cycle → test cycle,
 * execution → test run + test log, attachment → blob-handle upload.
 */

import { z } from 'zod';

import {
  ZephyrExecutionSchema,
  ZephyrFolderSchema,
  ZephyrTestCaseSchema,
  ZephyrTestCycleSchema,
  type ZephyrStep,
} from '../../source/zephyr-schemas.js';
import type { QTestProperty, TestStepLogPayload, TestStepPayload } from '../../types.js';
import { mapCustomFields } from './custom-fields.js';
import { parseSource } from './parse-source.js';
import type { MappingContext, MappingRule, MappingRuleSet } from './registry.js';
import { mapPriority, mapStatus } from './value-maps.js';

function optional(value: string | null | undefined): string | undefined {
  return value === null || value === undefined || value === '' ? undefined : value;
}

/** Steps in source order; a missing index keeps the listed position. */
function orderedSteps(steps: ZephyrStep[]): ZephyrStep[] {
  return steps
    .map((step, position) => ({ step, position }))
    .sort((a, b) => (a.step.index ?? a.position) - (b.step.index ?? b.position) || a.position - b.position)
    .map(({ step }) => step);
}

/** Test data has no qTest counterpart; it is appended to the step description. */
export function stepDescription(step: ZephyrStep): string {
  const description = step.description ?? '';
  const data = optional(step.testData) ?? optional(step.data);
  return data ? `${description}\n\nTest Data: ${data}` : description;
}

export const folderRule: MappingRule<'folder'> = (entity, context) => {
  const folder = parseSource(ZephyrFolderSchema, entity);
  return {
    name: folder.name,
    description: optional(folder.description),
    parentId: context.reference('parent'),
  };
};

export const testCaseRule: MappingRule<'testCase'> = (entity, context) => {
  const testCase = parseSource(ZephyrTestCaseSchema, entity);
  const { mappings } = context;

  const properties: QTestProperty[] = mapCustomFields(testCase.customFields, mappings.customFields, context.warn);

  const priorityName = optional(testCase.priorityName) ?? optional(testCase.priority);
  const priority = mapPriority(priorityName, mappings.priorities);
  if (!priority.known) {
    context.warn(`Unknown priority "${priorityName}" on test case ${entity.sourceId}; using ${priority.value}`);
  }
  if (mappings.priorityFieldId !== undefined) {
    properties.push({ field_id: mappings.priorityFieldId, field_value: priority.value });
  }

  const testSteps: TestStepPayload[] = orderedSteps(testCase.steps).map((step, i) => ({
    description: stepDescription(step),
    expected: step.expectedResult ?? '',
    order: i + 1,
  }));

  return {
    name: testCase.name,
    description: optional(testCase.objective) ?? optional(testCase.description),
    precondition: optional(testCase.precondition),
    parentId: context.reference('folder'),
    properties,
    testSteps,
  };
};

export const testCycleRule: MappingRule<'testCycle'> = (entity, context) => {
  const cycle = parseSource(ZephyrTestCycleSchema, entity);
  return {
    name: cycle.name,
    description: optional(cycle.description),
    parentId: context.reference('folder'),
    plannedStartDate: optional(cycle.plannedStartDate),
    plannedEndDate: optional(cycle.plannedEndDate),
    properties: mapCustomFields(cycle.customFields, context.mappings.customFields, context.warn),
  };
};

function executionStatus(value: string | null | undefined, context: MappingContext, sourceId: string): string {
  const status = mapStatus(value, context.mappings.statuses);
  if (!status.known) {
    context.warn(`Unknown status "${value}" on execution ${sourceId}; using ${status.value}`);
  }
  return status.value;
}

export const testExecutionRule: MappingRule<'testExecution'> = (entity, context) => {
  const execution = parseSource(ZephyrExecutionSchema, entity);

  const startedAt = optional(execution.executedOn) ?? optional(execution.actualEndDate) ?? entity.extractedAt;
  const endedAt = optional(execution.actualEndDate) ?? startedAt;

  const stepLogs: TestStepLogPayload[] = orderedSteps(execution.steps).map((step, i) => ({
    order: i + 1,
    status: executionStatus(step.status, context, entity.sourceId),
    actualResult: step.actualResult ?? '',
  }));

  return {
    run: {
      name: `Test Run for ${optional(execution.testCaseKey) ?? optional(execution.key) ?? execution.id}`,
      testCaseId: context.reference('testCase') ?? '',
      testCycleId: context.reference('testCycle') ?? '',
      properties: mapCustomFields(execution.customFields, context.mappings.customFields, context.warn),
    },
    log: {
      status: executionStatus(execution.testExecutionStatus ?? execution.status, context, entity.sourceId),
      executionStartDate: startedAt,
      executionEndDate: endedAt,
      note: optional(execution.comment),
      stepLogs,
    },
  };
};

const StagedAttachmentSchema = z.object({
  filename: z.string().min(1),
  contentType: z.string().min(1),
  localPath: z.string().min(1),
  ownerType: z.enum(['testCase', 'testExecution']),
});

export const attachmentRule: MappingRule<'attachment'> = (entity, context) => {
  const attachment = parseSource(StagedAttachmentSchema, entity);
  return {
    ownerType: attachment.ownerType === 'testCase' ? 'test-cases' : 'test-runs',
    ownerId: context.reference('owner') ?? '',
    filename: attachment.filename,
    contentType: attachment.contentType,
    localPath: attachment.localPath,
  };
};

export function zephyrToQTestRules(): MappingRuleSet {
  return {
    folder: folderRule,
    testCase: testCaseRule,
    testCycle: testCycleRule,
    testExecution: testExecutionRule,
    attachment: attachmentRule,
  };
}
