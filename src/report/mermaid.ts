/**
 * StrideGraph Report — Mermaid diagram generator.
 *
 * DFD-style rendering of the inferred graph:
 * 1. Distinct shapes: actors (()), data stores [()], everything else []
 * 2. Directed edges use arrows, undirected ones plain links
 * 3. Edge label is the relationship confidence
 * 4. Components carrying a critical finding get a red stroke
 */

import type { ComponentType, DetectedComponent, ReportRecord } from '../types/index.js';

/** Sanitize for Mermaid node IDs */
function nid(name: string): string {
  return name.replace(/[^a-zA-Z0-9_]/g, '_');
}

/** Escape for Mermaid labels */
function esc(s: string): string {
  return s.replace(/"/g, '#quot;').replace(/\r?\n/g, ' ');
}

/** Truncate */
function trunc(s: string, max = 30): string {
  return s.length <= max ? s : s.slice(0, max - 1) + '…';
}

function shape(type: ComponentType, text: string): string {
  switch (type) {
    case 'User':     return `(("${text}"))`;
    case 'Database': return `[("${text}")]`;
    case 'LoadBalancer': return `{{"${text}"}}`;
    default:         return `["${text}"]`;
  }
}

function nodeLine(c: DetectedComponent): string {
  const text = esc(`${c.id}: ${trunc(c.label)} (${c.type})`);
  return `  ${nid(c.id)}${shape(c.type, text)}`;
}

export function generateMermaid(record: ReportRecord): string {
  const lines: string[] = ['graph LR'];

  for (const c of record.components) lines.push(nodeLine(c));

  if (record.relationships.length > 0) lines.push('');
  for (const r of record.relationships) {
    const link = r.directed ? '-->' : '---';
    lines.push(`  ${nid(r.sourceId)} ${link}|"${r.confidence.toFixed(2)}"| ${nid(r.targetId)}`);
  }

  const critical = new Set<string>();
  for (const s of record.subjects) {
    if (s.subject.kind !== 'component') continue;
    if (s.findings.some(f => f.band === 'critical')) critical.add(s.subject.id);
  }
  if (critical.size > 0) lines.push('');
  for (const c of record.components) {
    if (critical.has(c.id)) lines.push(`  style ${nid(c.id)} stroke:#e74c3c,stroke-width:2px`);
  }

  return lines.join('\n');
}
