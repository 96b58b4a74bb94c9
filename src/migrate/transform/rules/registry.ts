/**
 * Mapping Rule Registry
 *
 * Rule sets are keyed by "source→target" platform pairs. A rule set holds
 * one pure mapping function per entity type; single rules can be replaced
 * without re-registering the whole set.
 */

import type { MappingConfig } from '../../../config.js';
import type { DestinationPayloads, EntityType, SourceEntity } from '../../types.js';

export interface MappingContext {
  /** Destination ID of the entity referenced under `role`, if it has one */
  reference(role: string): string | undefined;
  mappings: MappingConfig;
  warn(message: string): void;
}

export type MappingRule<K extends EntityType> = (entity: SourceEntity, context: MappingContext) => DestinationPayloads[K];

export type MappingRuleSet = { [K in EntityType]: MappingRule<K> };

type RuleOverrides = { [K in EntityType]?: MappingRule<K> };

const ruleSets = new Map<string, () => MappingRuleSet>();
const overrides = new Map<string, RuleOverrides>();

function pairKey(source: string, target: string): string {
  return `${source}→${target}`;
}

/**
 * Register the rule set for a source→target pair.
 */
export function registerMappingRules(source: string, target: string, factory: () => MappingRuleSet): void {
  ruleSets.set(pairKey(source, target), factory);
}

/**
 * Replace the rule of one entity type for a source→target pair.
 */
export function registerMappingRule<K extends EntityType>(
  source: string,
  target: string,
  entityType: K,
  rule: MappingRule<K>,
): void {
  const key = pairKey(source, target);
  const current: RuleOverrides = { ...overrides.get(key) };
  const slots: { [P in K]?: MappingRule<P> } = current;
  slots[entityType] = rule;
  overrides.set(key, current);
}

/**
 * Rule set for a source→target pair with any single-rule overrides applied.
 */
export function getMappingRules(source: string, target: string): MappingRuleSet | null {
  const key = pairKey(source, target);
  const factory = ruleSets.get(key);
  return factory ? { ...factory(), ...overrides.get(key) } : null;
}

/** Drop single-rule overrides for a pair. */
export function clearMappingRuleOverrides(source: string, target: string): void {
  overrides.delete(pairKey(source, target));
}

export function listMappingRules(): Array<{ source: string; target: string }> {
  return [...ruleSets.keys()].map((key) => {
    const [source = '', target = ''] = key.split('→');
    return { source, target };
  });
}

// ─── Built-in Rule Sets ──────────────────────────────────────

import { zephyrToQTestRules } from './zephyr-to-qtest.js';

registerMappingRules('zephyr', 'qtest', zephyrToQTestRules);
