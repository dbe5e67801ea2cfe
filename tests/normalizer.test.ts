import { describe, it, expect } from 'vitest';
import { normalizeDetections, componentsAsDetections } from '../src/normalizer/normalize.js';
import { normalizeLabel, buildAliasTable, resolveComponentType } from '../src/normalizer/labels.js';
import { iou, boxProblem, clampBox, normalizeBox } from '../src/normalizer/geometry.js';
import { DEFAULT_ENGINE_CONFIG, withDefaults } from '../src/config/defaults.js';
import { InputError } from '../src/errors.js';
import { SQUARE, det, overlappingDatabases, threeInARow } from './fixtures/detections.js';

// ─── Labels ──────────────────────────────────────────────────────────

describe('normalizeLabel', () => {
  it('normalizes various forms to canonical', () => {
    expect(normalizeLabel('Load Balancer')).toBe('load_balancer');
    expect(normalizeLabel('load-balancer')).toBe('load_balancer');
    expect(normalizeLabel('LOAD__BALANCER')).toBe('load_balancer');
    expect(normalizeLabel('  API Gateway ')).toBe('api_gateway');
    expect(normalizeLabel('_db_')).toBe('db');
  });
});

describe('resolveComponentType', () => {
  const aliases = buildAliasTable();

  it('maps known aliases', () => {
    expect(resolveComponentType('Web Server', aliases)).toBe('Server');
    expect(resolveComponentType('postgres', aliases)).toBe('Database');
    expect(resolveComponentType('Browser', aliases)).toBe('User');
    expect(resolveComponentType('ALB', aliases)).toBe('LoadBalancer');
    expect(resolveComponentType('api-gateway', aliases)).toBe('API');
  });

  it('maps unknown labels to Unknown', () => {
    expect(resolveComponentType('message queue', aliases)).toBe('Unknown');
    expect(resolveComponentType('', aliases)).toBe('Unknown');
  });

  it('lets configured aliases override the built-ins', () => {
    const custom = buildAliasTable({ 'Message Queue': 'Server', gateway: 'LoadBalancer' });
    expect(resolveComponentType('message-queue', custom)).toBe('Server');
    expect(resolveComponentType('gateway', custom)).toBe('LoadBalancer');
  });
});

// ─── Geometry ────────────────────────────────────────────────────────

describe('geometry', () => {
  it('computes IoU', () => {
    const a = { x: 0, y: 0, width: 0.2, height: 0.2 };
    expect(iou(a, a)).toBe(1);
    expect(iou(a, { x: 0.5, y: 0.5, width: 0.1, height: 0.1 })).toBe(0);
    expect(iou(a, { x: 0.1, y: 0, width: 0.2, height: 0.2 })).toBeCloseTo(1 / 3, 10);
  });

  it('normalizes pixel boxes by the image size', () => {
    expect(normalizeBox({ x: 100, y: 50, width: 200, height: 100 }, { width: 1000, height: 500 }))
      .toEqual({ x: 0.1, y: 0.1, width: 0.2, height: 0.2 });
  });

  it('explains malformed boxes', () => {
    expect(boxProblem({ x: 0, y: 0, width: 0, height: 0.1 })).toBe('non-positive size 0x0.1');
    expect(boxProblem({ x: -0.1, y: 0, width: 0.1, height: 0.1 })).toBe('origin outside the image');
    expect(boxProblem({ x: 0.95, y: 0, width: 0.1, height: 0.1 })).toBe('extends past the image border');
    expect(boxProblem({ x: Number.NaN, y: 0, width: 0.1, height: 0.1 })).toBe('non-finite coordinate');
    expect(boxProblem({ x: 0.9, y: 0.9, width: 0.1, height: 0.1 })).toBeNull();
  });

  it('clamps border noise into the unit square', () => {
    const inside = { x: 0.25, y: 0.5, width: 0.3, height: 0.2 };
    expect(clampBox(inside)).toEqual(inside);

    const clamped = clampBox({ x: -5e-10, y: 0.8, width: 0.1, height: 0.2 + 5e-10 });
    expect(clamped.x).toBe(0);
    expect(clamped.y).toBe(0.8);
    expect(clamped.width).toBeCloseTo(0.1, 8);
    expect(clamped.y + clamped.height).toBeLessThanOrEqual(1);
  });
});

// ─── normalizeDetections ─────────────────────────────────────────────

describe('normalizeDetections', () => {
  it('merges overlapping duplicates, keeping the most confident', () => {
    const { components, diagnostics } = normalizeDetections(overlappingDatabases, SQUARE);
    expect(components).toHaveLength(1);
    expect(components[0]).toEqual({
      id: 'C1',
      type: 'Database',
      label: 'database',
      boundingBox: { x: 0.1, y: 0.1, width: 0.2, height: 0.2 },
      confidence: 0.9,
    });
    expect(diagnostics).toEqual([{
      level: 'info',
      code: 'merged-duplicate',
      index: 1,
      label: 'db',
      message: 'Detection #1 (db, 0.7) merged into #0 (database, 0.9)',
    }]);
  });

  it('keeps overlapping boxes at or below the IoU threshold', () => {
    const config = withDefaults({ iouThreshold: 0.9 });
    const { components } = normalizeDetections(overlappingDatabases, SQUARE, config);
    expect(components).toHaveLength(2);
  });

  it('assigns ids in reading order (x, then y)', () => {
    const { components } = normalizeDetections([
      det('database', 0.8, 700, 100),
      det('server', 0.8, 400, 600),
      det('user', 0.8, 400, 100),
    ], SQUARE);
    expect(components.map(c => `${c.id}:${c.type}`)).toEqual(['C1:User', 'C2:Server', 'C3:Database']);
  });

  it('drops detections below the confidence threshold', () => {
    const { components, diagnostics } = normalizeDetections([det('server', 0.2, 100, 100)], SQUARE);
    expect(components).toEqual([]);
    expect(diagnostics[0].code).toBe('low-confidence');
    expect(diagnostics[0].level).toBe('info');
  });

  it('keeps a detection exactly at the confidence threshold', () => {
    const { components } = normalizeDetections([det('server', 0.25, 100, 100)], SQUARE);
    expect(components).toHaveLength(1);
  });

  it('skips malformed boxes and invalid confidences with a warning', () => {
    const { components, diagnostics } = normalizeDetections([
      det('server', 0.9, 950, 100),
      det('api', 1.5, 100, 100),
      det('user', 0.9, 100, 100, -10, 50),
      det('database', 0.9, 500, 500),
    ], SQUARE);
    expect(components.map(c => c.type)).toEqual(['Database']);
    expect(diagnostics.map(d => [d.index, d.level, d.code])).toEqual([
      [0, 'warning', 'malformed-bbox'],
      [1, 'warning', 'invalid-confidence'],
      [2, 'warning', 'malformed-bbox'],
    ]);
    expect(diagnostics[0].message).toBe('Detection #0 (server) skipped: bounding box extends past the image border');
  });

  it('maps unknown labels to Unknown and notes it', () => {
    const { components, diagnostics } = normalizeDetections([det('kafka', 0.9, 100, 100)], SQUARE);
    expect(components[0].type).toBe('Unknown');
    expect(components[0].label).toBe('kafka');
    expect(diagnostics).toEqual([{
      level: 'info',
      code: 'unknown-label',
      index: 0,
      label: 'kafka',
      message: 'Detection #0: label "kafka" is not a known component type, classified as Unknown',
    }]);
  });

  it('returns nothing for empty input', () => {
    expect(normalizeDetections([], SQUARE)).toEqual({ components: [], diagnostics: [] });
  });

  it('rejects non-positive image dimensions', () => {
    expect(() => normalizeDetections([], { width: 0, height: 100 })).toThrow(InputError);
  });

  it('is idempotent on its own output', () => {
    const first = normalizeDetections([...overlappingDatabases, ...threeInARow.slice(0, 2)], SQUARE);
    const second = normalizeDetections(componentsAsDetections(first.components), { width: 1, height: 1 });
    expect(second.components).toEqual(first.components);
    expect(second.diagnostics).toEqual([]);
  });

  it('stores boxes inside [0,1] even when they touch the border', () => {
    const { components, diagnostics } = normalizeDetections([det('server', 0.9, -5e-7, 100)], SQUARE);
    expect(diagnostics).toEqual([]);
    const box = components[0].boundingBox;
    expect(box.x).toBe(0);
    expect(box.y).toBe(0.1);
    expect(box.width).toBeCloseTo(0.1, 8);
    expect(box.height).toBe(0.1);
  });

  it('returns frozen components', () => {
    const { components } = normalizeDetections(threeInARow, SQUARE, DEFAULT_ENGINE_CONFIG);
    expect(Object.isFrozen(components[0])).toBe(true);
    expect(Object.isFrozen(components[0].boundingBox)).toBe(true);
  });
});
