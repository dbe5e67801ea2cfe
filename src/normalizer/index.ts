/**
 * StrideGraph Normalizer — Public API
 */

export { normalizeDetections, componentsAsDetections } from './normalize.js';
export type { NormalizeOptions } from './normalize.js';
export { normalizeLabel, buildAliasTable, resolveComponentType } from './labels.js';
export type { AliasTable } from './labels.js';
export { iou, center, centerDistance, normalizeBox, boxProblem, clampBox } from './geometry.js';
