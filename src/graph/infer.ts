/**
 * StrideGraph — Relationship inference.
 *
 * No connector lines come from the detector, so adjacency is inferred from
 * layout: two components whose box centres are close in normalized space
 * are assumed to talk to each other.
 *
 *   proximity = 1 − centreDistance / √2      (√2 = unit-square diagonal)
 *
 * Every unordered pair yields at most one Relationship. Pairs listed in
 * canonicalDirections are oriented accordingly; the rest become a single
 * undirected edge with sourceId = the lower-ordered component.
 */

import type { ComponentType, DetectedComponent, EngineConfig, Relationship } from '../types/index.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults.js';
import { centerDistance } from '../normalizer/geometry.js';

export type InferOptions = Pick<EngineConfig, 'proximityThreshold' | 'canonicalDirections'>;

const UNIT_DIAGONAL = Math.SQRT2;

export function proximityScore(a: DetectedComponent, b: DetectedComponent): number {
  return 1 - centerDistance(a.boundingBox, b.boundingBox) / UNIT_DIAGONAL;
}

export function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

type Orientation = 'forward' | 'reverse' | 'undirected';

/** How the pair (a, b) should be oriented given the canonical direction list. */
export function orientation(
  a: ComponentType,
  b: ComponentType,
  directions: readonly (readonly [ComponentType, ComponentType])[],
): Orientation {
  const forward = directions.some(([s, t]) => s === a && t === b);
  const reverse = directions.some(([s, t]) => s === b && t === a);
  if (forward && !reverse) return 'forward';
  if (reverse && !forward) return 'reverse';
  return 'undirected';
}

/**
 * Infer relationships for components already in id order.
 * Output is sorted by (source, target) position in that order.
 */
export function inferRelationships(
  components: readonly DetectedComponent[],
  options: InferOptions = DEFAULT_ENGINE_CONFIG,
): Relationship[] {
  if (components.length < 2) return [];

  const position = new Map<string, number>();
  components.forEach((c, i) => position.set(c.id, i));

  const relationships: Relationship[] = [];
  for (let i = 0; i < components.length; i++) {
    for (let j = i + 1; j < components.length; j++) {
      const a = components[i];
      const b = components[j];
      if (a.id === b.id) continue;

      const proximity = proximityScore(a, b);
      if (!(proximity > options.proximityThreshold)) continue;

      const confidence = clampUnit(proximity);
      const dir = orientation(a.type, b.type, options.canonicalDirections);
      const [source, target] = dir === 'reverse' ? [b, a] : [a, b];
      const rel: Relationship = {
        sourceId: source.id,
        targetId: target.id,
        kind: 'CommunicatesWith',
        directed: dir !== 'undirected',
        confidence,
      };
      relationships.push(Object.freeze(rel));
    }
  }

  const pos = (id: string) => position.get(id) ?? Number.MAX_SAFE_INTEGER;
  return relationships.sort((x, y) => pos(x.sourceId) - pos(y.sourceId) || pos(x.targetId) - pos(y.targetId));
}
