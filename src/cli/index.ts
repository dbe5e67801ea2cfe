#!/usr/bin/env node

/**
 * StrideGraph CLI
 *
 * Usage:
 *   stridegraph analyze <detections.json>   Build the threat graph and write a STRIDE report
 *   stridegraph batch [dir]                 Analyze every *.detections.json under a directory
 *   stridegraph graph <detections.json>     Print the inferred ThreatGraph as JSON
 *   stridegraph rules <list|validate> [file] Inspect or validate a rule table
 *   stridegraph config show                 Show the resolved engine configuration
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import { writeFile } from 'node:fs/promises';
import gradient from 'gradient-string';
import chalk from 'chalk';
import type { NormalizeDiagnostic, RuleTable, Severity } from '../types/index.js';
import { resolveEngineConfig, type ResolvedConfig } from '../config/index.js';
import { defaultRuleTable, loadRuleTable, DEFAULT_RULES_PATH } from '../rules/index.js';
import { loadDetectionFile } from '../input/index.js';
import { buildThreatGraph } from '../graph/index.js';
import { runAnalysis, analyzeBatch } from '../pipeline/index.js';
import { generateSarif } from '../analyzer/index.js';
import { severityBadge, SEVERITY_BANDS } from '../report/index.js';
import { ErrorCode, StrideGraphError } from '../errors.js';
import { createLogger, setLogLevel } from '../utils/logger.js';
import { VERSION } from '../version.js';

const log = createLogger('cli');

const program = new Command();

const ASCII_LOGO = `
███████ ████████ ██████  ██ ██████  ███████  ██████  ██████   █████  ██████  ██   ██
██         ██    ██   ██ ██ ██   ██ ██      ██       ██   ██ ██   ██ ██   ██ ██   ██
███████    ██    ██████  ██ ██   ██ █████   ██   ███ ██████  ███████ ██████  ███████
     ██    ██    ██   ██ ██ ██   ██ ██      ██    ██ ██   ██ ██   ██ ██      ██   ██
███████    ██    ██   ██ ██ ██████  ███████  ██████  ██   ██ ██   ██ ██      ██   ██
`;

program
  .name('stridegraph')
  .description('StrideGraph — STRIDE threat models from architecture diagram detections.')
  .version(VERSION)
  .option('-v, --verbose', 'Log debug output to stderr')
  .addHelpText('before', gradient(['#00ff41', '#00d4ff'])(ASCII_LOGO))
  .hook('preAction', (cmd) => {
    if (cmd.opts<{ verbose?: boolean }>().verbose) setLogLevel('debug');
  });

// ─── Shared options ──────────────────────────────────────────────────

interface EngineOpts {
  config?: string;
  rules?: string;
  confidenceThreshold?: number;
  iouThreshold?: number;
  proximityThreshold?: number;
}

function parseUnit(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return n;
}

function isSeverity(value: string): value is Severity {
  return SEVERITY_BANDS.some(b => b === value);
}

function parseSeverity(value: string): Severity {
  if (!isSeverity(value)) throw new InvalidArgumentError(`Expected one of: ${SEVERITY_BANDS.join(', ')}.`);
  return value;
}

function withEngineOptions(cmd: Command): Command {
  return cmd
    .option('--config <file>', 'Engine config JSON (default: .stridegraph/config.json if present)')
    .option('--rules <file>', 'Rule table JSON (default: built-in table)')
    .option('--confidence-threshold <n>', 'Drop detections below this confidence', parseUnit)
    .option('--iou-threshold <n>', 'Merge overlapping detections above this IoU', parseUnit)
    .option('--proximity-threshold <n>', 'Link components scoring above this proximity', parseUnit);
}

function resolveEngine(opts: EngineOpts): { resolved: ResolvedConfig; ruleTable: RuleTable } {
  const resolved = resolveEngineConfig({
    configPath: opts.config,
    flags: {
      confidenceThreshold: opts.confidenceThreshold,
      iouThreshold: opts.iouThreshold,
      proximityThreshold: opts.proximityThreshold,
    },
  });
  log.debug(`Config sources: ${resolved.sources.join(' < ')}`);
  const ruleTable = opts.rules ? loadRuleTable(resolve(opts.rules)) : defaultRuleTable();
  log.debug(`Rule table ${ruleTable.version}: ${ruleTable.entries.length} rule(s)`);
  return { resolved, ruleTable };
}

// ─── analyze ─────────────────────────────────────────────────────────

withEngineOptions(
  program
    .command('analyze')
    .description('Build the threat graph for one image and write a STRIDE report')
    .argument('<detections>', 'Detection JSON file')
    .option('-o, --output <file>', 'Markdown report path', 'stride_report.md')
    .option('--json <file>', 'Also write the structured report record')
    .option('--sarif <file>', 'Also write SARIF 2.1.0')
    .option('--min-severity <sev>', 'SARIF: only findings at or above this band', parseSeverity)
    .option('--title <title>', 'Report title (default: the input\'s source)'),
).action(async (file: string, opts: EngineOpts & { output: string; json?: string; sarif?: string; minSeverity?: Severity; title?: string }) => {
  const { resolved, ruleTable } = resolveEngine(opts);
  const input = loadDetectionFile(resolve(file));
  const { report } = runAnalysis(input, resolved.config, ruleTable, { title: opts.title });
  const { record } = report;

  printDiagnostics(record.diagnostics);

  await writeFile(resolve(opts.output), report.markdown + '\n');
  console.error(`✓ Wrote STRIDE report to ${opts.output}`);

  if (opts.json) {
    await writeFile(resolve(opts.json), JSON.stringify(record, null, 2) + '\n');
    console.error(`✓ Wrote report record to ${opts.json}`);
  }
  if (opts.sarif) {
    const sarif = generateSarif(record, { minSeverity: opts.minSeverity });
    await writeFile(resolve(opts.sarif), JSON.stringify(sarif, null, 2) + '\n');
    const results = sarif.runs[0]?.results.length ?? 0;
    console.error(`✓ Wrote SARIF to ${opts.sarif} (${results} result(s))`);
  }

  const { summary } = record;
  console.log(`Components:     ${summary.components}`);
  console.log(`Relationships:  ${summary.relationships}`);
  console.log(`Findings:       ${summary.findings}`);
  console.log(`Overall risk:   ${severityBadge(summary.overallRisk)}`);
});

// ─── batch ───────────────────────────────────────────────────────────

withEngineOptions(
  program
    .command('batch')
    .description('Analyze every *.detections.json under a directory')
    .argument('[dir]', 'Directory to scan', '.')
    .option('--out-dir <dir>', 'Where to write <name>.stride.md / .stride.json, mirroring subdirectories (default: dir)'),
).action(async (dir: string, opts: EngineOpts & { outDir?: string }) => {
  const { resolved, ruleTable } = resolveEngine(opts);
  const root = resolve(dir);
  const result = await analyzeBatch({
    root,
    outDir: opts.outDir ? resolve(opts.outDir) : undefined,
    config: resolved.config,
    ruleTable,
  });

  for (const item of result.processed) {
    console.log(`${chalk.green('✓')} ${item.file}  ${item.findings} finding(s)  ${severityBadge(item.overallRisk)}`);
  }
  for (const f of result.failed) {
    console.log(`${chalk.red('✗')} ${f.file}  ${f.error.userMessage}`);
  }
  console.error(`\n${result.processed.length} analyzed, ${result.failed.length} failed`);
  if (result.failed.length > 0) process.exitCode = 1;
});

// ─── graph ───────────────────────────────────────────────────────────

withEngineOptions(
  program
    .command('graph')
    .description('Print the inferred ThreatGraph as JSON')
    .argument('<detections>', 'Detection JSON file'),
).action((file: string, opts: EngineOpts) => {
  const { resolved } = resolveEngine(opts);
  const input = loadDetectionFile(resolve(file));
  const graph = buildThreatGraph(input.detections, input.image, resolved.config);
  printDiagnostics(graph.diagnostics);
  console.log(JSON.stringify(graph, null, 2));
});

// ─── rules ───────────────────────────────────────────────────────────

program
  .command('rules')
  .description('Inspect or validate a STRIDE rule table')
  .argument('<action>', 'Action: list, validate')
  .argument('[file]', 'Rule table JSON (default: built-in table)')
  .action((action: string, file?: string) => {
    const path = file ? resolve(file) : DEFAULT_RULES_PATH;

    switch (action) {
      case 'list': {
        const table = loadRuleTable(path);
        console.log(chalk.bold(`Rule table ${table.version} — ${table.entries.length} rule(s)`));
        for (const r of table.entries) {
          console.log(`  ${r.id.padEnd(36)} ${r.componentType.padEnd(13)} ${r.role.padEnd(11)} ${r.category}`);
        }
        break;
      }

      case 'validate': {
        const table = loadRuleTable(path);
        console.error(`✓ ${path}: ${table.entries.length} rule(s), every component type covered`);
        break;
      }

      default:
        console.error(`Unknown action: ${action}. Use: list, validate`);
        process.exitCode = 1;
    }
  });

// ─── config ──────────────────────────────────────────────────────────

program
  .command('config')
  .description('Show the resolved engine configuration')
  .argument('<action>', 'Action: show')
  .option('--config <file>', 'Engine config JSON (default: .stridegraph/config.json if present)')
  .action((action: string, opts: { config?: string }) => {
    if (action !== 'show') {
      console.error(`Unknown action: ${action}. Use: show`);
      process.exitCode = 1;
      return;
    }
    const { config, sources } = resolveEngineConfig({ configPath: opts.config });
    console.log(JSON.stringify(config, null, 2));
    console.error(`Sources: ${sources.join(' < ')}`);
  });

program.parseAsync().catch(handleError);

// ─── Helpers ─────────────────────────────────────────────────────────

function printDiagnostics(diagnostics: readonly NormalizeDiagnostic[]) {
  for (const d of diagnostics) {
    if (d.level === 'warning') console.error(`${chalk.yellow('⚠')} ${d.message}`);
    else log.debug(d.message);
  }
  const warnings = diagnostics.filter(d => d.level === 'warning').length;
  if (warnings > 0) console.error(`\n${warnings} detection(s) skipped\n`);
}

const HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CONFIG_INVALID]: 'Check --config, .stridegraph/config.json and the STRIDEGRAPH_* environment variables.',
  [ErrorCode.RULE_TABLE_INVALID]: 'Run `stridegraph rules validate <file>` to check the table.',
  [ErrorCode.RULE_TABLE_INCOMPLETE]: 'Every component type needs at least one Node rule.',
  [ErrorCode.INPUT_INVALID]: 'A detection file needs "image": { width, height } and a "detections" array.',
};

function handleError(err: unknown): void {
  const error = StrideGraphError.fromError(err);
  console.error(`${chalk.red('✗')} ${error.userMessage}`);
  const hint = HINTS[error.code];
  if (hint) console.error(chalk.dim(`  → ${hint}`));
  log.debug(`${error.code}: ${error.message}`, error.context);
  process.exitCode = 1;
}
