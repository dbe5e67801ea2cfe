/**
 * Box geometry helpers. All inputs are normalized boxes unless stated.
 */

import type { BoundingBox, ImageDimensions } from '../types/index.js';

/** Tolerance for float noise at the image border */
const EDGE_EPSILON = 1e-9;

export function area(box: BoundingBox): number {
  return box.width * box.height;
}

/** Intersection-over-Union; 0 when the boxes do not overlap. */
export function iou(a: BoundingBox, b: BoundingBox): number {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);
  if (right <= left || bottom <= top) return 0;
  const intersection = (right - left) * (bottom - top);
  const union = area(a) + area(b) - intersection;
  return union > 0 ? intersection / union : 0;
}

export function center(box: BoundingBox): { x: number; y: number } {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

export function centerDistance(a: BoundingBox, b: BoundingBox): number {
  const ca = center(a);
  const cb = center(b);
  return Math.hypot(ca.x - cb.x, ca.y - cb.y);
}

/** Divide a pixel box by the image size. */
export function normalizeBox(box: BoundingBox, dims: ImageDimensions): BoundingBox {
  return {
    x: box.x / dims.width,
    y: box.y / dims.height,
    width: box.width / dims.width,
    height: box.height / dims.height,
  };
}

/** Why a box is unusable, or null when it is fine. */
export function boxProblem(box: BoundingBox): string | null {
  const values = [box.x, box.y, box.width, box.height];
  if (values.some(v => !Number.isFinite(v))) return 'non-finite coordinate';
  if (box.width <= 0 || box.height <= 0) return `non-positive size ${box.width}x${box.height}`;
  if (box.x < -EDGE_EPSILON || box.y < -EDGE_EPSILON) return 'origin outside the image';
  if (box.x + box.width > 1 + EDGE_EPSILON || box.y + box.height > 1 + EDGE_EPSILON) {
    return 'extends past the image border';
  }
  return null;
}

/** Pull a validated box inside [0,1]; boxes already inside come back unchanged. */
export function clampBox(box: BoundingBox): BoundingBox {
  const [x, width] = clampSpan(box.x, box.width);
  const [y, height] = clampSpan(box.y, box.height);
  return { x, y, width, height };
}

function clampSpan(start: number, size: number): [number, number] {
  if (start >= 0 && start + size <= 1) return [start, size];
  const from = Math.min(Math.max(start, 0), 1);
  return [from, Math.min(start + size, 1) - from];
}
