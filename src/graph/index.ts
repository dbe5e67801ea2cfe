/**
 * StrideGraph Graph — Public API
 */

export { buildThreatGraph, assembleGraph, findComponent, neighbors } from './build.js';
export { inferRelationships, proximityScore, orientation, clampUnit } from './infer.js';
export type { InferOptions } from './infer.js';
