/**
 * StrideGraph — Detection file loader.
 *
 * The contract between the vision model and this engine:
 *
 *   {
 *     "source": "diagrams/checkout.png",          // optional
 *     "image": { "width": 1280, "height": 720 },
 *     "detections": [
 *       { "label": "api_gateway", "confidence": 0.91,
 *         "bbox": { "x": 400, "y": 120, "width": 160, "height": 90 } },
 *       { "label": "db", "confidence": 0.88, "bbox": [900, 400, 140, 120] }
 *     ]
 *   }
 *
 * Box values are not range-checked here; the normalizer skips bad boxes with
 * a diagnostic so one bad detection does not reject the whole file.
 */

import { existsSync, readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { BoundingBox, ImageDimensions, RawDetection } from '../types/index.js';
import { ErrorCode, InputError, StrideGraphError } from '../errors.js';

const boxObjectSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

const boxTupleSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number()])
  .transform(([x, y, width, height]): BoundingBox => ({ x, y, width, height }));

const detectionSchema = z.object({
  label: z.string(),
  confidence: z.number(),
  bbox: z.union([boxObjectSchema, boxTupleSchema]),
});

export const detectionFileSchema = z.object({
  source: z.string().optional(),
  image: z.object({
    width: z.number().positive(),
    height: z.number().positive(),
  }),
  detections: z.array(detectionSchema),
});

export interface DetectionInput {
  source?: string;
  image: ImageDimensions;
  detections: RawDetection[];
}

/** Validate an already-parsed JSON value. */
export function parseDetectionInput(data: unknown, origin = 'detection input'): DetectionInput {
  const result = detectionFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const at = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new InputError(`${origin}: ${at}: ${issue.message}`, {
      origin,
      path: at,
      issues: result.error.issues.length,
    });
  }
  const { source, image, detections } = result.data;
  return source === undefined ? { image, detections } : { source, image, detections };
}

function notFound(filePath: string): StrideGraphError {
  return new StrideGraphError(
    `Detection file not found: ${filePath}`,
    ErrorCode.IO_FILE_NOT_FOUND,
    `Cannot find ${filePath}`,
    { path: filePath },
  );
}

function decode(text: string, filePath: string): DetectionInput {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new InputError(`${filePath}: not valid JSON (${err instanceof Error ? err.message : String(err)})`, { path: filePath });
  }
  return parseDetectionInput(data, filePath);
}

export function loadDetectionFile(filePath: string): DetectionInput {
  if (!existsSync(filePath)) throw notFound(filePath);
  return decode(readFileSync(filePath, 'utf-8'), filePath);
}

/** Async variant used by the batch runner. */
export async function readDetectionFile(filePath: string): Promise<DetectionInput> {
  if (!existsSync(filePath)) throw notFound(filePath);
  return decode(await readFile(filePath, 'utf-8'), filePath);
}
