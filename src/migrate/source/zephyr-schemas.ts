/**
 * Zephyr Scale response shapes.
 *
 * Objects pass unknown keys through so the staged payload keeps everything
 * the API sent. IDs arrive as numbers or strings and are normalised to strings.
 */

import { z } from 'zod';

export const ZephyrIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

/** Either a bare ID or an `{ id, self }` link object. */
export const ZephyrRefSchema = z.union([
  ZephyrIdSchema,
  z
    .object({ id: ZephyrIdSchema })
    .passthrough()
    .transform((ref) => ref.id),
]);

/** Either a bare name or an object carrying one. */
const NamedSchema = z.union([
  z.string(),
  z
    .object({ name: z.string() })
    .passthrough()
    .transform((named) => named.name),
]);

export const ZephyrPageSchema = z.object({
  values: z.array(z.unknown()),
  startAt: z.number().int().optional(),
  maxResults: z.number().int().optional(),
  total: z.number().int().optional(),
  isLast: z.boolean().optional(),
});

export const ZephyrItemSchema = z.object({ id: ZephyrIdSchema }).passthrough();

/** Custom fields come as a name → value object or as a list of typed entries. */
export const ZephyrCustomFieldsSchema = z.union([
  z.record(z.string(), z.unknown()),
  z.array(
    z
      .object({
        name: z.string(),
        type: z.string().optional(),
        value: z.unknown(),
      })
      .passthrough(),
  ),
]);

export const ZephyrStepSchema = z
  .object({
    index: z.number().int().optional(),
    description: z.string().nullish(),
    expectedResult: z.string().nullish(),
    testData: z.string().nullish(),
    data: z.string().nullish(),
    actualResult: z.string().nullish(),
    status: NamedSchema.nullish(),
  })
  .passthrough();

export const ZephyrFolderSchema = z
  .object({
    id: ZephyrIdSchema,
    name: z.string().min(1),
    parentId: ZephyrIdSchema.nullish(),
    folderType: z.string().nullish(),
    description: z.string().nullish(),
  })
  .passthrough();

export const ZephyrTestCaseSchema = z
  .object({
    id: ZephyrIdSchema,
    key: z.string().nullish(),
    name: z.string().min(1),
    objective: z.string().nullish(),
    description: z.string().nullish(),
    precondition: z.string().nullish(),
    priority: NamedSchema.nullish(),
    priorityName: z.string().nullish(),
    status: NamedSchema.nullish(),
    labels: z.array(z.string()).default([]),
    steps: z.array(ZephyrStepSchema).default([]),
    customFields: ZephyrCustomFieldsSchema.nullish(),
  })
  .passthrough();

export const ZephyrTestCycleSchema = z
  .object({
    id: ZephyrIdSchema,
    key: z.string().nullish(),
    name: z.string().min(1),
    description: z.string().nullish(),
    status: NamedSchema.nullish(),
    plannedStartDate: z.string().nullish(),
    plannedEndDate: z.string().nullish(),
    customFields: ZephyrCustomFieldsSchema.nullish(),
  })
  .passthrough();

export const ZephyrExecutionSchema = z
  .object({
    id: ZephyrIdSchema,
    key: z.string().nullish(),
    testCaseKey: z.string().nullish(),
    status: NamedSchema.nullish(),
    testExecutionStatus: NamedSchema.nullish(),
    executedOn: z.string().nullish(),
    actualEndDate: z.string().nullish(),
    executedBy: z.string().nullish(),
    environment: NamedSchema.nullish(),
    comment: z.string().nullish(),
    steps: z.array(ZephyrStepSchema).default([]),
    customFields: ZephyrCustomFieldsSchema.nullish(),
  })
  .passthrough();

export const ZephyrAttachmentSchema = z
  .object({
    id: ZephyrIdSchema,
    filename: z.string().nullish(),
    name: z.string().nullish(),
    contentType: z.string().nullish(),
    mimeType: z.string().nullish(),
    fileSize: z.number().nullish(),
    size: z.number().nullish(),
  })
  .passthrough();

export type ZephyrFolder = z.infer<typeof ZephyrFolderSchema>;
export type ZephyrTestCase = z.infer<typeof ZephyrTestCaseSchema>;
export type ZephyrTestCycle = z.infer<typeof ZephyrTestCycleSchema>;
export type ZephyrExecution = z.infer<typeof ZephyrExecutionSchema>;
export type ZephyrStep = z.infer<typeof ZephyrStepSchema>;
export type ZephyrCustomFields = z.infer<typeof ZephyrCustomFieldsSchema>;
