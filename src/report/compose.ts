/**
 * StrideGraph Report — Composer.
 *
 * composeReport() builds the structured ReportRecord first and renders the
 * Markdown from it, so the two representations cannot disagree. Nothing
 * time- or environment-dependent goes in: same findings, same bytes.
 */

import type {
  ComposedReport, DetectedComponent, FindingRecord, FindingSubject,
  HighestSeverityRecord, Relationship, ReportRecord, ReportSummary,
  Severity, StrideCategory, SubjectRecord, ThreatFinding, ThreatGraph,
} from '../types/index.js';
import { STRIDE_CATEGORIES } from '../types/index.js';
import { sortFindings, subjectKey } from '../reasoner/order.js';
import { bandFor } from './severity.js';
import { renderMarkdown, singleLine } from './report.js';

/** Current report JSON schema version */
export const REPORT_SCHEMA_VERSION = '1.0.0';

export const DEFAULT_TITLE = 'Architecture Diagram';

export interface ReportContext {
  /** Graph the findings came from; supplies counts and the component tables */
  graph?: ThreatGraph;
  title?: string;
  /** Diagram the detections were taken from, shown verbatim */
  source?: string;
  ruleTableVersion?: string;
}

export function composeReport(findings: readonly ThreatFinding[], context: ReportContext = {}): ComposedReport {
  const record = buildRecord(findings, context);
  return { markdown: renderMarkdown(record), record };
}

export function buildRecord(findings: readonly ThreatFinding[], context: ReportContext = {}): ReportRecord {
  const graph = context.graph;
  const components = new Map<string, DetectedComponent>();
  const relationships = new Map<string, Relationship>();
  for (const c of graph?.components ?? []) components.set(c.id, c);
  for (const r of graph?.relationships ?? []) {
    relationships.set(subjectKey({ kind: 'relationship', sourceId: r.sourceId, targetId: r.targetId }), r);
  }

  const headingOf = (subject: FindingSubject): string => {
    if (subject.kind === 'component') {
      const c = components.get(subject.id);
      return c ? `${c.id} · ${c.type} "${singleLine(c.label)}"` : subject.id;
    }
    const r = relationships.get(subjectKey(subject));
    const arrow = r && !r.directed ? '↔' : '→';
    return `${subject.sourceId} ${arrow} ${subject.targetId}`;
  };

  // ── Group by subject, in report order ──
  const subjects: SubjectRecord[] = [];
  let current: SubjectRecord | null = null;
  let currentKey = '';
  for (const f of sortFindings(findings)) {
    const key = subjectKey(f.subject);
    if (!current || key !== currentKey) {
      current = { subject: f.subject, heading: headingOf(f.subject), findings: [] };
      currentKey = key;
      subjects.push(current);
    }
    current.findings.push(toFindingRecord(f));
  }

  const summary = summarize(subjects, graph);
  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    title: context.title ?? DEFAULT_TITLE,
    source: context.source ?? null,
    ruleTableVersion: context.ruleTableVersion ?? null,
    summary,
    components: graph ? [...graph.components] : [],
    relationships: graph ? [...graph.relationships] : [],
    subjects,
    diagnostics: graph ? [...graph.diagnostics] : [],
  };
}

function toFindingRecord(f: ThreatFinding): FindingRecord {
  return {
    category: f.category,
    severity: f.severity,
    band: bandFor(f.severity),
    description: f.description,
    countermeasure: f.countermeasure,
    ruleIds: [...f.ruleIds],
  };
}

function summarize(subjects: readonly SubjectRecord[], graph?: ThreatGraph): ReportSummary {
  const componentCount = graph
    ? graph.components.length
    : subjects.filter(s => s.subject.kind === 'component').length;
  const relationshipCount = graph
    ? graph.relationships.length
    : subjects.filter(s => s.subject.kind === 'relationship').length;

  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  const byCategory: Record<StrideCategory, number> = {
    'Spoofing': 0,
    'Tampering': 0,
    'Repudiation': 0,
    'Information Disclosure': 0,
    'Denial of Service': 0,
    'Elevation of Privilege': 0,
  };
  let highest: HighestSeverityRecord | null = null;
  let total = 0;

  for (const s of subjects) {
    for (const f of s.findings) {
      total++;
      bySeverity[f.band]++;
      byCategory[f.category]++;
      if (!highest || f.severity > highest.severity) {
        highest = { subject: s.subject, heading: s.heading, category: f.category, severity: f.severity, band: f.band };
      }
    }
  }

  const overallRisk = highest ? highest.band : null;
  return {
    components: componentCount,
    relationships: relationshipCount,
    findings: total,
    highestSeverity: highest,
    overallRisk,
    bySeverity,
    byCategory,
    executiveSummary: executiveSummary(componentCount, relationshipCount, total, overallRisk, byCategory),
  };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

function executiveSummary(
  components: number,
  relationships: number,
  findings: number,
  overallRisk: Severity | null,
  byCategory: Record<StrideCategory, number>,
): string {
  if (components === 0) return 'No components were detected in the diagram.';
  const head = `${plural(components, 'component')} and ${plural(relationships, 'relationship')}`;
  if (findings === 0 || !overallRisk) return `${head} produced no findings.`;

  // STRIDE order breaks ties
  let top: StrideCategory = STRIDE_CATEGORIES[0];
  for (const c of STRIDE_CATEGORIES) if (byCategory[c] > byCategory[top]) top = c;

  const risk = overallRisk.charAt(0).toUpperCase() + overallRisk.slice(1);
  return `${head} produced ${plural(findings, 'finding')}; overall risk is ${risk}. `
    + `Most frequent category: ${top} (${byCategory[top]}).`;
}
