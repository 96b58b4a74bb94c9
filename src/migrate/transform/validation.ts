/**
 * Destination Payload Validation
 *
 * Required-field constraints of the qTest create endpoints. A payload that
 * fails here is never sent.
 */

import { z } from 'zod';

import { ValidationError, formatIssues } from '../errors.js';
import type { TransformedPayload } from '../types.js';

const RequiredText = z.string().trim().min(1);

const Timestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'must be a date-time');

const PropertySchema = z.object({
  field_id: z.number().int(),
  field_value: z.union([z.string(), z.number(), z.boolean()]),
});

export const ModulePayloadSchema = z.object({
  name: RequiredText,
  description: z.string().optional(),
  parentId: RequiredText.optional(),
});

export const TestCasePayloadSchema = z.object({
  name: RequiredText,
  description: z.string().optional(),
  precondition: z.string().optional(),
  parentId: RequiredText.optional(),
  properties: z.array(PropertySchema),
  testSteps: z.array(
    z.object({
      description: RequiredText,
      expected: z.string(),
      order: z.number().int().min(1),
    }),
  ),
});

export const TestCyclePayloadSchema = z.object({
  name: RequiredText,
  description: z.string().optional(),
  parentId: RequiredText.optional(),
  plannedStartDate: Timestamp.optional(),
  plannedEndDate: Timestamp.optional(),
  properties: z.array(PropertySchema),
});

export const TestRunPayloadSchema = z.object({
  run: z.object({
    name: RequiredText,
    testCaseId: RequiredText,
    testCycleId: RequiredText,
    properties: z.array(PropertySchema),
  }),
  log: z.object({
    status: RequiredText,
    executionStartDate: Timestamp,
    executionEndDate: Timestamp,
    note: z.string().optional(),
    stepLogs: z.array(
      z.object({
        order: z.number().int().min(1),
        status: RequiredText,
        actualResult: z.string(),
      }),
    ),
  }),
});

export const AttachmentPayloadSchema = z.object({
  ownerType: z.enum(['test-cases', 'test-runs']),
  ownerId: RequiredText,
  filename: RequiredText,
  contentType: RequiredText,
  localPath: RequiredText,
});

function schemaFor(transformed: TransformedPayload): z.ZodTypeAny {
  switch (transformed.entityType) {
    case 'folder':
      return ModulePayloadSchema;
    case 'testCase':
      return TestCasePayloadSchema;
    case 'testCycle':
      return TestCyclePayloadSchema;
    case 'testExecution':
      return TestRunPayloadSchema;
    case 'attachment':
      return AttachmentPayloadSchema;
  }
}

/**
 * Throw a ValidationError listing every violated constraint.
 */
export function validateTransformed(transformed: TransformedPayload): void {
  const result = schemaFor(transformed).safeParse(transformed.payload);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Invalid ${transformed.entityType} payload: ${issues.join('; ')}`, issues);
  }
}
