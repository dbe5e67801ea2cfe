/**
 * StrideGraph — STRIDE reasoner.
 *
 * Pure function from (ThreatGraph, RuleTable) to ordered findings. All
 * knowledge about which threats apply lives in the rule table; this file
 * only looks rows up and renders them.
 *
 *   node:  every Node row for the component's type → one finding each
 *   edge:  EdgeSource rows of the initiator + EdgeTarget rows of the
 *          receiver, unioned by category (one finding per category).
 *          Undirected edges are read from both ends.
 *
 *   severity = weight(category) × confidence
 */

import type {
  DetectedComponent, Relationship, RuleEntry, RuleTable, SeverityWeights,
  StrideCategory, ThreatFinding, ThreatGraph,
} from '../types/index.js';
import { ErrorCode, StrideGraphError } from '../errors.js';
import { DEFAULT_SEVERITY_WEIGHTS } from '../config/defaults.js';
import { rulesFor } from '../rules/table.js';
import { renderTemplate } from '../rules/template.js';
import { sortFindings } from './order.js';

export interface AnalyzeOptions {
  severityWeights?: Partial<SeverityWeights>;
}

export function severityScore(weights: SeverityWeights, category: StrideCategory, confidence: number): number {
  return roundSeverity(weights[category] * confidence);
}

/** Three decimals: the precision shown in reports, so record and text agree. */
export function roundSeverity(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function formatConfidence(confidence: number): string {
  return confidence.toFixed(2);
}

export function nodeFields(c: DetectedComponent): Record<string, string> {
  return {
    id: c.id,
    type: c.type,
    label: c.label,
    confidence: formatConfidence(c.confidence),
  };
}

/** Fields for an edge read from `from` (initiator) to `to` (receiver). */
export function edgeFields(from: DetectedComponent, to: DetectedComponent, rel: Relationship): Record<string, string> {
  return {
    sourceId: from.id,
    targetId: to.id,
    sourceType: from.type,
    targetType: to.type,
    sourceLabel: from.label,
    targetLabel: to.label,
    confidence: formatConfidence(rel.confidence),
  };
}

interface EdgeMatch {
  rule: RuleEntry;
  fields: Record<string, string>;
}

export function analyze(
  graph: ThreatGraph,
  ruleTable: RuleTable,
  options: AnalyzeOptions = {},
): ThreatFinding[] {
  const weights: SeverityWeights = { ...DEFAULT_SEVERITY_WEIGHTS, ...options.severityWeights };
  const byId = new Map<string, DetectedComponent>();
  for (const c of graph.components) byId.set(c.id, c);

  const findings: ThreatFinding[] = [];

  // ── Nodes ──
  for (const c of graph.components) {
    const fields = nodeFields(c);
    for (const rule of rulesFor(ruleTable, c.type, 'Node')) {
      findings.push({
        subject: { kind: 'component', id: c.id },
        category: rule.category,
        description: renderTemplate(rule.descriptionTemplate, fields, rule.id),
        countermeasure: renderTemplate(rule.countermeasureTemplate, fields, rule.id),
        severity: severityScore(weights, rule.category, c.confidence),
        ruleIds: [rule.id],
      });
    }
  }

  // ── Edges ──
  for (const rel of graph.relationships) {
    const source = byId.get(rel.sourceId);
    const target = byId.get(rel.targetId);
    if (!source || !target) {
      throw new StrideGraphError(
        `Relationship ${rel.sourceId} → ${rel.targetId} references a component that is not in the graph`,
        ErrorCode.INTERNAL_UNKNOWN,
      );
    }

    const perspectives: [DetectedComponent, DetectedComponent][] = rel.directed
      ? [[source, target]]
      : [[source, target], [target, source]];

    const matches: EdgeMatch[] = [];
    for (const [from, to] of perspectives) {
      const fields = edgeFields(from, to, rel);
      for (const rule of rulesFor(ruleTable, from.type, 'EdgeSource')) matches.push({ rule, fields });
      for (const rule of rulesFor(ruleTable, to.type, 'EdgeTarget')) matches.push({ rule, fields });
    }

    // First row per category supplies the text; every contributing row is credited
    const byCategory = new Map<StrideCategory, { first: EdgeMatch; ruleIds: string[] }>();
    for (const match of matches) {
      const existing = byCategory.get(match.rule.category);
      if (!existing) {
        byCategory.set(match.rule.category, { first: match, ruleIds: [match.rule.id] });
      } else if (!existing.ruleIds.includes(match.rule.id)) {
        existing.ruleIds.push(match.rule.id);
      }
    }

    for (const [category, { first, ruleIds }] of byCategory) {
      findings.push({
        subject: { kind: 'relationship', sourceId: rel.sourceId, targetId: rel.targetId },
        category,
        description: renderTemplate(first.rule.descriptionTemplate, first.fields, first.rule.id),
        countermeasure: renderTemplate(first.rule.countermeasureTemplate, first.fields, first.rule.id),
        severity: severityScore(weights, category, rel.confidence),
        ruleIds,
      });
    }
  }

  return sortFindings(findings);
}
