/**
 * StrideGraph — Component normalizer.
 * Turns raw detector output into canonical, deduplicated components.
 *
 * Pipeline per detection: confidence sanity → box normalization →
 * box validation → confidence threshold → label mapping. Survivors are
 * then merged greedily by IoU (highest confidence first) and given ids
 * in reading order (x, then y).
 */

import type {
  BoundingBox, ComponentType, DetectedComponent, EngineConfig,
  ImageDimensions, NormalizeDiagnostic, NormalizeResult, RawDetection,
} from '../types/index.js';
import { InputError } from '../errors.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults.js';
import { boxProblem, clampBox, iou, normalizeBox } from './geometry.js';
import { buildAliasTable, resolveComponentType } from './labels.js';

export type NormalizeOptions = Pick<EngineConfig, 'confidenceThreshold' | 'iouThreshold' | 'labelAliases'>;

interface Candidate {
  index: number;
  label: string;
  type: ComponentType;
  box: BoundingBox;
  confidence: number;
}

export function normalizeDetections(
  detections: readonly RawDetection[],
  dims: ImageDimensions,
  options: NormalizeOptions = DEFAULT_ENGINE_CONFIG,
): NormalizeResult {
  assertDimensions(dims);

  const aliases = buildAliasTable(options.labelAliases);
  const diagnostics: NormalizeDiagnostic[] = [];
  const candidates: Candidate[] = [];

  detections.forEach((det, index) => {
    const label = det.label;
    if (!Number.isFinite(det.confidence) || det.confidence < 0 || det.confidence > 1) {
      diagnostics.push({
        level: 'warning', code: 'invalid-confidence', index, label,
        message: `Detection #${index} (${label}) skipped: confidence ${det.confidence} is outside [0,1]`,
      });
      return;
    }

    const raw = normalizeBox(det.bbox, dims);
    const problem = boxProblem(raw);
    if (problem) {
      diagnostics.push({
        level: 'warning', code: 'malformed-bbox', index, label,
        message: `Detection #${index} (${label}) skipped: bounding box ${problem}`,
      });
      return;
    }

    if (det.confidence < options.confidenceThreshold) {
      diagnostics.push({
        level: 'info', code: 'low-confidence', index, label,
        message: `Detection #${index} (${label}) dropped: confidence ${det.confidence} below ${options.confidenceThreshold}`,
      });
      return;
    }

    const type = resolveComponentType(label, aliases);
    if (type === 'Unknown') {
      diagnostics.push({
        level: 'info', code: 'unknown-label', index, label,
        message: `Detection #${index}: label "${label}" is not a known component type, classified as Unknown`,
      });
    }
    candidates.push({ index, label, type, box: clampBox(raw), confidence: det.confidence });
  });

  // ── Deduplicate (greedy, highest confidence wins) ──
  const kept: Candidate[] = [];
  for (const c of [...candidates].sort(byConfidenceDesc)) {
    const winner = kept.find(k => iou(k.box, c.box) > options.iouThreshold);
    if (winner) {
      diagnostics.push({
        level: 'info', code: 'merged-duplicate', index: c.index, label: c.label,
        message: `Detection #${c.index} (${c.label}, ${c.confidence}) merged into #${winner.index} (${winner.label}, ${winner.confidence})`,
      });
      continue;
    }
    kept.push(c);
  }

  // ── Assign ids in reading order ──
  const components = kept.sort(byPosition).map((c, i): DetectedComponent => Object.freeze({
    id: `C${i + 1}`,
    type: c.type,
    label: c.label,
    boundingBox: Object.freeze({ ...c.box }),
    confidence: c.confidence,
  }));

  diagnostics.sort((a, b) => a.index - b.index || compareText(a.code, b.code));
  return { components, diagnostics };
}

function assertDimensions(dims: ImageDimensions): void {
  const ok = Number.isFinite(dims.width) && Number.isFinite(dims.height) && dims.width > 0 && dims.height > 0;
  if (!ok) {
    throw new InputError(`image dimensions must be positive, got ${dims.width}x${dims.height}`, {
      width: dims.width,
      height: dims.height,
    });
  }
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function byConfidenceDesc(a: Candidate, b: Candidate): number {
  return b.confidence - a.confidence
    || a.box.x - b.box.x
    || a.box.y - b.box.y
    || compareText(a.label, b.label)
    || a.index - b.index;
}

function byPosition(a: Candidate, b: Candidate): number {
  return a.box.x - b.box.x
    || a.box.y - b.box.y
    || compareText(a.type, b.type)
    || b.confidence - a.confidence
    || compareText(a.label, b.label);
}

/**
 * Turn components back into detections in normalized space, for feeding
 * the normalizer its own output (use dimensions 1×1).
 */
export function componentsAsDetections(components: readonly DetectedComponent[]): RawDetection[] {
  return components.map(c => ({
    label: c.label,
    confidence: c.confidence,
    bbox: { ...c.boundingBox },
  }));
}
