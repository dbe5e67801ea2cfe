/**
 * StrideGraph — Batch runner.
 * Finds detection files under a directory and runs one independent pipeline
 * per file, writing `<name>.stride.md` and `<name>.stride.json` side by side
 * into the output directory. Subdirectories of the root are mirrored under
 * the output directory, so same-named files never share a report path.
 *
 * A file that fails to load is reported in `failed`; it does not stop the
 * other runs.
 */

import fg from 'fast-glob';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, join, relative, resolve } from 'node:path';
import type { EngineConfig, RuleTable, Severity } from '../types/index.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults.js';
import { defaultRuleTable } from '../rules/table.js';
import { readDetectionFile } from '../input/detections.js';
import { StrideGraphError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { runAnalysis } from './run.js';

const log = createLogger('batch');

export const DETECTION_FILE_SUFFIX = '.detections.json';

const DEFAULT_INCLUDE = [`**/*${DETECTION_FILE_SUFFIX}`];

const DEFAULT_EXCLUDE = ['**/node_modules/**', '**/.git/**'];

export interface BatchOptions {
  /** Directory to scan */
  root: string;
  /** Where reports go (default: root) */
  outDir?: string;
  include?: string[];
  exclude?: string[];
  config?: EngineConfig;
  ruleTable?: RuleTable;
}

export interface BatchItem {
  /** Detection file, relative to root */
  file: string;
  markdownPath: string;
  jsonPath: string;
  components: number;
  findings: number;
  overallRisk: Severity | null;
}

export interface BatchFailure {
  file: string;
  error: StrideGraphError;
}

export interface BatchResult {
  processed: BatchItem[];
  failed: BatchFailure[];
}

/** `checkout.detections.json` → `checkout` */
export function reportBaseName(file: string): string {
  const name = basename(file);
  return name.endsWith(DETECTION_FILE_SUFFIX)
    ? name.slice(0, -DETECTION_FILE_SUFFIX.length)
    : name.replace(/\.json$/, '');
}

/** `nested/checkout.detections.json` → `<outDir>/nested/checkout` */
export function reportStem(outDir: string, file: string): string {
  return join(outDir, dirname(file), reportBaseName(file));
}

export async function analyzeBatch(options: BatchOptions): Promise<BatchResult> {
  const {
    root,
    include = DEFAULT_INCLUDE,
    exclude = DEFAULT_EXCLUDE,
    config = DEFAULT_ENGINE_CONFIG,
    ruleTable = defaultRuleTable(),
  } = options;
  const outDir = resolve(options.outDir ?? root);

  const files = (await fg(include, {
    cwd: root,
    ignore: exclude,
    absolute: true,
  })).sort();
  log.info(`Found ${files.length} detection file(s) under ${root}`);

  await mkdir(outDir, { recursive: true });

  const outcomes = await Promise.all(files.map(async (filePath) => {
    const file = relative(root, filePath);
    try {
      const input = await readDetectionFile(filePath);
      const { report } = runAnalysis(input, config, ruleTable);
      const stem = reportStem(outDir, file);
      const markdownPath = `${stem}.stride.md`;
      const jsonPath = `${stem}.stride.json`;
      await mkdir(dirname(stem), { recursive: true });
      await writeFile(markdownPath, report.markdown + '\n');
      await writeFile(jsonPath, JSON.stringify(report.record, null, 2) + '\n');
      log.debug(`${file}: ${report.record.summary.findings} finding(s)`);
      const item: BatchItem = {
        file,
        markdownPath,
        jsonPath,
        components: report.record.summary.components,
        findings: report.record.summary.findings,
        overallRisk: report.record.summary.overallRisk,
      };
      return { ok: true as const, item };
    } catch (err) {
      const error = StrideGraphError.fromError(err);
      log.error(`${file}: ${error.userMessage}`);
      return { ok: false as const, failure: { file, error } };
    }
  }));

  const processed: BatchItem[] = [];
  const failed: BatchFailure[] = [];
  for (const o of outcomes) {
    if (o.ok) processed.push(o.item);
    else failed.push(o.failure);
  }
  return { processed, failed };
}
