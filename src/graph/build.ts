/**
 * StrideGraph — ThreatGraph assembly.
 *
 * Index-based: a node array, an edge array, and an adjacency list keyed by
 * component id. Nodes never point at each other. The returned graph is
 * frozen; it belongs to the run that built it.
 */

import type {
  DetectedComponent, EngineConfig, ImageDimensions,
  NormalizeDiagnostic, RawDetection, Relationship, ThreatGraph,
} from '../types/index.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults.js';
import { normalizeDetections } from '../normalizer/normalize.js';
import { inferRelationships } from './infer.js';

export function buildThreatGraph(
  detections: readonly RawDetection[],
  dims: ImageDimensions,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): ThreatGraph {
  const { components, diagnostics } = normalizeDetections(detections, dims, config);
  const relationships = inferRelationships(components, config);
  return assembleGraph(components, relationships, diagnostics);
}

/** Freeze components + relationships into a graph with its adjacency list. */
export function assembleGraph(
  components: readonly DetectedComponent[],
  relationships: readonly Relationship[],
  diagnostics: readonly NormalizeDiagnostic[] = [],
): ThreatGraph {
  const adjacency: Record<string, string[]> = {};
  for (const c of components) adjacency[c.id] = [];
  for (const r of relationships) {
    adjacency[r.sourceId]?.push(r.targetId);
    if (!r.directed) adjacency[r.targetId]?.push(r.sourceId);
  }

  const frozenAdjacency: Record<string, readonly string[]> = {};
  for (const [id, ids] of Object.entries(adjacency)) frozenAdjacency[id] = Object.freeze(ids);

  return Object.freeze({
    components: Object.freeze([...components]),
    relationships: Object.freeze([...relationships]),
    adjacency: Object.freeze(frozenAdjacency),
    diagnostics: Object.freeze([...diagnostics]),
  });
}

export function findComponent(graph: ThreatGraph, id: string): DetectedComponent | undefined {
  return graph.components.find(c => c.id === id);
}

/** Ids reachable from `id` over one edge (respecting direction). */
export function neighbors(graph: ThreatGraph, id: string): readonly string[] {
  return graph.adjacency[id] ?? [];
}
