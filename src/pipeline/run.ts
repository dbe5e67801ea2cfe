/**
 * StrideGraph — Single-image pipeline.
 *
 * detections → normalize → infer → graph → analyze → compose
 *
 * Pure: no I/O, no logging, no shared state. The rule table is only read.
 */

import type { EngineConfig, ComposedReport, RuleTable, ThreatFinding, ThreatGraph } from '../types/index.js';
import type { DetectionInput } from '../input/detections.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/defaults.js';
import { buildThreatGraph } from '../graph/build.js';
import { analyze } from '../reasoner/stride.js';
import { composeReport } from '../report/compose.js';
import { defaultRuleTable } from '../rules/table.js';

export interface RunOptions {
  /** Report title; defaults to the input's source, then a generic title */
  title?: string;
}

export interface AnalysisResult {
  graph: ThreatGraph;
  findings: ThreatFinding[];
  report: ComposedReport;
}

export function runAnalysis(
  input: DetectionInput,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
  ruleTable: RuleTable = defaultRuleTable(),
  options: RunOptions = {},
): AnalysisResult {
  const graph = buildThreatGraph(input.detections, input.image, config);
  const findings = analyze(graph, ruleTable, { severityWeights: config.severityWeights });
  const report = composeReport(findings, {
    graph,
    title: options.title ?? input.source,
    source: input.source,
    ruleTableVersion: ruleTable.version,
  });
  return { graph, findings, report };
}
