/**
 * Engine defaults. Every threshold the engine reads has its default here;
 * the core never consults the environment.
 */

import type { ComponentType, EngineConfig, SeverityWeights } from '../types/index.js';

/** Elevation of Privilege and Tampering outrank Repudiation. */
export const DEFAULT_SEVERITY_WEIGHTS: Readonly<SeverityWeights> = Object.freeze({
  'Elevation of Privilege': 1.0,
  'Tampering': 0.9,
  'Spoofing': 0.8,
  'Information Disclosure': 0.8,
  'Denial of Service': 0.7,
  'Repudiation': 0.5,
});

export const DEFAULT_CANONICAL_DIRECTIONS: readonly (readonly [ComponentType, ComponentType])[] = Object.freeze([
  ['User', 'API'],
  ['API', 'Server'],
  ['Server', 'Database'],
  ['LoadBalancer', 'Server'],
  ['User', 'LoadBalancer'],
  ['LoadBalancer', 'API'],
] as const);
for (const pair of DEFAULT_CANONICAL_DIRECTIONS) Object.freeze(pair);

function frozenDirections(): [ComponentType, ComponentType][] {
  const directions = DEFAULT_CANONICAL_DIRECTIONS.map(([s, t]): [ComponentType, ComponentType] => {
    const pair: [ComponentType, ComponentType] = [s, t];
    Object.freeze(pair);
    return pair;
  });
  Object.freeze(directions);
  return directions;
}

const NO_ALIASES: Record<string, ComponentType> = {};
Object.freeze(NO_ALIASES);

/** Frozen all the way down; withDefaults() hands out mutable copies. */
export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  confidenceThreshold: 0.25,
  iouThreshold: 0.5,
  proximityThreshold: 0.6,
  severityWeights: Object.freeze({ ...DEFAULT_SEVERITY_WEIGHTS }),
  labelAliases: NO_ALIASES,
  canonicalDirections: frozenDirections(),
});

export interface EngineConfigOverrides {
  confidenceThreshold?: number;
  iouThreshold?: number;
  proximityThreshold?: number;
  severityWeights?: Partial<SeverityWeights>;
  labelAliases?: Record<string, ComponentType>;
  canonicalDirections?: [ComponentType, ComponentType][];
}

/** Fill gaps in a partial config from the defaults. */
export function withDefaults(partial: EngineConfigOverrides = {}): EngineConfig {
  return {
    confidenceThreshold: partial.confidenceThreshold ?? DEFAULT_ENGINE_CONFIG.confidenceThreshold,
    iouThreshold: partial.iouThreshold ?? DEFAULT_ENGINE_CONFIG.iouThreshold,
    proximityThreshold: partial.proximityThreshold ?? DEFAULT_ENGINE_CONFIG.proximityThreshold,
    severityWeights: { ...DEFAULT_SEVERITY_WEIGHTS, ...partial.severityWeights },
    labelAliases: { ...partial.labelAliases },
    canonicalDirections: partial.canonicalDirections
      ? partial.canonicalDirections.map(([s, t]): [ComponentType, ComponentType] => [s, t])
      : DEFAULT_ENGINE_CONFIG.canonicalDirections.map(([s, t]): [ComponentType, ComponentType] => [s, t]),
  };
}
