import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseDetectionInput, loadDetectionFile, readDetectionFile } from '../src/input/detections.js';
import { ErrorCode, InputError } from '../src/errors.js';

describe('parseDetectionInput', () => {
  it('accepts object and tuple boxes', () => {
    const input = parseDetectionInput({
      source: 'arch.png',
      image: { width: 800, height: 600 },
      detections: [
        { label: 'db', confidence: 0.9, bbox: { x: 10, y: 20, width: 30, height: 40 } },
        { label: 'api', confidence: 0.8, bbox: [50, 60, 70, 80] },
      ],
    });
    expect(input).toEqual({
      source: 'arch.png',
      image: { width: 800, height: 600 },
      detections: [
        { label: 'db', confidence: 0.9, bbox: { x: 10, y: 20, width: 30, height: 40 } },
        { label: 'api', confidence: 0.8, bbox: { x: 50, y: 60, width: 70, height: 80 } },
      ],
    });
  });

  it('leaves source out when absent', () => {
    const input = parseDetectionInput({ image: { width: 1, height: 1 }, detections: [] });
    expect(input).toEqual({ image: { width: 1, height: 1 }, detections: [] });
  });

  it('passes out-of-range values through for the normalizer to judge', () => {
    const input = parseDetectionInput({
      image: { width: 10, height: 10 },
      detections: [{ label: 'x', confidence: 3, bbox: [-5, 0, 0, 0] }],
    });
    expect(input.detections[0].confidence).toBe(3);
  });

  it('names the failing path', () => {
    expect(() => parseDetectionInput({ image: { width: 10, height: 10 }, detections: [{ label: 'x', confidence: 0.5 }] }, 'file.json'))
      .toThrow(/^file\.json: detections\.0\.bbox: /);
  });

  it('rejects non-positive image dimensions', () => {
    try {
      parseDetectionInput({ image: { width: 0, height: 10 }, detections: [] });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(InputError);
      expect(err).toMatchObject({ code: ErrorCode.INPUT_INVALID });
    }
  });
});

describe('loadDetectionFile', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'stridegraph-input-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('loads a file from disk', async () => {
    const path = join(root, 'a.detections.json');
    writeFileSync(path, JSON.stringify({ image: { width: 100, height: 100 }, detections: [] }));
    expect(loadDetectionFile(path)).toEqual({ image: { width: 100, height: 100 }, detections: [] });
    await expect(readDetectionFile(path)).resolves.toEqual({ image: { width: 100, height: 100 }, detections: [] });
  });

  it('reports missing files and bad JSON', async () => {
    expect(() => loadDetectionFile(join(root, 'none.json'))).toThrow(`Detection file not found: ${join(root, 'none.json')}`);
    await expect(readDetectionFile(join(root, 'none.json'))).rejects.toMatchObject({ code: ErrorCode.IO_FILE_NOT_FOUND });

    const bad = join(root, 'bad.json');
    writeFileSync(bad, '{');
    expect(() => loadDetectionFile(bad)).toThrow(InputError);
  });
});
