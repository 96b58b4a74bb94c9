import type { z } from 'zod';

import { ValidationError, formatIssues } from '../../errors.js';
import type { SourceEntity } from '../../types.js';

/**
 * Parse a staged source payload, turning schema violations into a
 * ValidationError that names the offending fields.
 */
export function parseSource<T extends z.ZodTypeAny>(schema: T, entity: SourceEntity): z.output<T> {
  const result = schema.safeParse(entity.payload);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(`Source ${entity.entityType} ${entity.sourceId} is malformed: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
