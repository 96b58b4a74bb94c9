/**
 * Entity Catalog
 *
 * Type-level dependencies between entity types. Loading a type starts only
 * after every type it depends on has reached its fixed point.
 */

import { ENTITY_TYPES, type EntityType } from './types.js';

export const TYPE_DEPENDENCIES: Record<EntityType, readonly EntityType[]> = {
  folder: [],
  testCase: ['folder'],
  testCycle: ['folder'],
  testExecution: ['testCase', 'testCycle'],
  attachment: ['testCase', 'testExecution'],
};

export const TYPE_LABELS: Record<EntityType, string> = {
  folder: 'Folders',
  testCase: 'Test cases',
  testCycle: 'Test cycles',
  testExecution: 'Test executions',
  attachment: 'Attachments',
};

/**
 * Every type that depends on `type`, directly or transitively, in dependency order.
 */
export function dependentsOf(type: EntityType): EntityType[] {
  const result = new Set<EntityType>();
  for (const candidate of ENTITY_TYPES) {
    const deps = TYPE_DEPENDENCIES[candidate];
    if (deps.includes(type) || deps.some((dep) => result.has(dep))) {
      result.add(candidate);
    }
  }
  return [...result];
}
