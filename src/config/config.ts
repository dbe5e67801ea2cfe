/**
 * StrideGraph — Engine configuration resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. Explicit flags (--confidence-threshold, --iou-threshold, --proximity-threshold)
 *   2. STRIDEGRAPH_* env vars
 *   3. Config file: --config <file>, else <cwd>/.stridegraph/config.json
 *   4. Built-in defaults
 *
 * Only callers (CLI, batch runner) resolve config. The engine functions take
 * the resulting EngineConfig as an argument.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { COMPONENT_TYPES, type EngineConfig } from '../types/index.js';
import { ConfigurationError, ErrorCode, StrideGraphError } from '../errors.js';
import { withDefaults } from './defaults.js';

// ─── Schema ──────────────────────────────────────────────────────────

const unitInterval = z.number().min(0).max(1);
const weight = z.number().nonnegative();
const componentType = z.enum(COMPONENT_TYPES);

export const engineConfigSchema = z.object({
  confidenceThreshold: unitInterval.optional(),
  iouThreshold: unitInterval.optional(),
  proximityThreshold: unitInterval.optional(),
  severityWeights: z.object({
    'Spoofing': weight.optional(),
    'Tampering': weight.optional(),
    'Repudiation': weight.optional(),
    'Information Disclosure': weight.optional(),
    'Denial of Service': weight.optional(),
    'Elevation of Privilege': weight.optional(),
  }).strict().optional(),
  labelAliases: z.record(componentType).optional(),
  canonicalDirections: z.array(z.tuple([componentType, componentType])).optional(),
}).strict();

export type EngineConfigInput = z.infer<typeof engineConfigSchema>;

/** Validate a partial config object; `origin` names it in error messages. */
export function parseEngineConfig(data: unknown, origin: string): EngineConfigInput {
  const result = engineConfigSchema.safeParse(data);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const key = issue.path.join('.') || '(root)';
  throw new ConfigurationError(`${origin}: ${key}: ${issue.message}`, key);
}

// ─── Sources ─────────────────────────────────────────────────────────

export const PROJECT_CONFIG_DIR = '.stridegraph';
const CONFIG_FILE = 'config.json';

/** Project-level config: <cwd>/.stridegraph/config.json */
export function projectConfigPath(cwd: string): string {
  return join(cwd, PROJECT_CONFIG_DIR, CONFIG_FILE);
}

export function readConfigFile(path: string): EngineConfigInput {
  if (!existsSync(path)) {
    throw new StrideGraphError(`Config file not found: ${path}`, ErrorCode.IO_FILE_NOT_FOUND, undefined, { path });
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${path} is not valid JSON (${reason})`);
  }
  return parseEngineConfig(data, path);
}

const ENV_KEYS = {
  confidenceThreshold: 'STRIDEGRAPH_CONFIDENCE_THRESHOLD',
  iouThreshold: 'STRIDEGRAPH_IOU_THRESHOLD',
  proximityThreshold: 'STRIDEGRAPH_PROXIMITY_THRESHOLD',
} as const;

type ThresholdKey = keyof typeof ENV_KEYS;

const THRESHOLD_KEYS: readonly ThresholdKey[] = ['confidenceThreshold', 'iouThreshold', 'proximityThreshold'];

export type ThresholdFlags = Partial<Record<ThresholdKey, number>>;

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EngineConfigInput {
  const out: ThresholdFlags = {};
  for (const key of THRESHOLD_KEYS) {
    const envVar = ENV_KEYS[key];
    const raw = env[envVar];
    if (raw === undefined || raw.trim() === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`${envVar} must be a number, got "${raw}"`, key);
    }
    out[key] = value;
  }
  return parseEngineConfig(out, 'environment');
}

// ─── Unified resolution ──────────────────────────────────────────────

export interface ResolveConfigOptions {
  cwd?: string;
  /** Explicit --config path; when given it must exist */
  configPath?: string;
  flags?: ThresholdFlags;
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedConfig {
  config: EngineConfig;
  /** Layers that contributed, lowest priority first */
  sources: string[];
}

export function resolveEngineConfig(options: ResolveConfigOptions = {}): ResolvedConfig {
  const cwd = options.cwd ?? process.cwd();
  const sources: string[] = ['defaults'];
  let merged: EngineConfigInput = {};

  const filePath = options.configPath
    ? resolve(cwd, options.configPath)
    : projectConfigPath(cwd);
  if (options.configPath || existsSync(filePath)) {
    merged = mergeLayer(merged, readConfigFile(filePath));
    sources.push(filePath);
  }

  const envLayer = readEnvConfig(options.env ?? process.env);
  if (Object.keys(envLayer).length > 0) {
    merged = mergeLayer(merged, envLayer);
    sources.push('environment');
  }

  const flags = stripUndefined(options.flags ?? {});
  if (Object.keys(flags).length > 0) {
    merged = mergeLayer(merged, parseEngineConfig(flags, 'flags'));
    sources.push('flags');
  }

  return { config: withDefaults(merged), sources };
}

function mergeLayer(base: EngineConfigInput, layer: EngineConfigInput): EngineConfigInput {
  return {
    ...base,
    ...layer,
    severityWeights: { ...base.severityWeights, ...layer.severityWeights },
    labelAliases: { ...base.labelAliases, ...layer.labelAliases },
  };
}

function stripUndefined(flags: ThresholdFlags): ThresholdFlags {
  const out: ThresholdFlags = {};
  for (const key of THRESHOLD_KEYS) {
    const value = flags[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}
