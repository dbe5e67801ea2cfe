/**
 * StrideGraph Report — Markdown renderer.
 * Produces a human-readable threat model report with an embedded Mermaid
 * diagram, risk matrix and per-subject finding tables.
 *
 * Reads nothing but the ReportRecord it is given.
 */

import type { ReportRecord, Severity } from '../types/index.js';
import { STRIDE_CATEGORIES } from '../types/index.js';
import { generateMermaid } from './mermaid.js';
import { SEVERITY_BANDS, severityBadge } from './severity.js';

export function renderMarkdown(record: ReportRecord): string {
  const lines: string[] = [];
  const { summary } = record;

  // ── Header ──
  lines.push(`# STRIDE Threat Model Report — ${singleLine(record.title)}`);
  lines.push('');
  if (record.source !== null) lines.push(`> Source: \`${singleLine(record.source)}\`  `);
  if (record.ruleTableVersion !== null) lines.push(`> Rule table: ${record.ruleTableVersion}  `);
  lines.push(`> Report schema: ${record.schemaVersion}`);
  lines.push('');

  // ── Executive Summary ──
  lines.push('## Executive Summary');
  lines.push('');
  lines.push(summary.executiveSummary);
  lines.push('');
  lines.push('| Metric | Count |');
  lines.push('|--------|-------|');
  lines.push(`| Components | ${summary.components} |`);
  lines.push(`| Relationships | ${summary.relationships} |`);
  lines.push(`| **Findings** | **${summary.findings}** |`);
  lines.push(`| Overall risk | ${severityBadge(summary.overallRisk)} |`);
  const top = summary.highestSeverity;
  if (top) {
    lines.push(`| Highest severity | ${formatScore(top.band, top.severity)} — ${top.category} on ${cell(top.heading)} |`);
  }
  lines.push('');

  // ── Risk Matrix ──
  if (summary.findings > 0) {
    lines.push('## Risk Matrix');
    lines.push('');
    lines.push('| Severity | Findings |');
    lines.push('|----------|----------|');
    for (const band of SEVERITY_BANDS) lines.push(`| ${severityBadge(band)} | ${summary.bySeverity[band]} |`);
    lines.push('');
    lines.push('| STRIDE Category | Findings |');
    lines.push('|-----------------|----------|');
    for (const category of STRIDE_CATEGORIES) lines.push(`| ${category} | ${summary.byCategory[category]} |`);
    lines.push('');
  }

  // ── Components ──
  if (record.components.length > 0) {
    lines.push('## Components');
    lines.push('');
    lines.push('| ID | Type | Label | Confidence | Box (x, y, w, h) |');
    lines.push('|----|------|-------|------------|------------------|');
    for (const c of record.components) {
      const b = c.boundingBox;
      const box = [b.x, b.y, b.width, b.height].map(v => v.toFixed(3)).join(', ');
      lines.push(`| ${c.id} | ${c.type} | ${cell(c.label)} | ${c.confidence.toFixed(2)} | ${box} |`);
    }
    lines.push('');
  }

  // ── Relationships ──
  if (record.relationships.length > 0) {
    lines.push('## Relationships');
    lines.push('');
    lines.push('| Source | Target | Direction | Confidence |');
    lines.push('|--------|--------|-----------|------------|');
    for (const r of record.relationships) {
      const direction = r.directed ? 'directed' : 'undirected';
      lines.push(`| ${r.sourceId} | ${r.targetId} | ${direction} | ${r.confidence.toFixed(2)} |`);
    }
    lines.push('');
  }

  // ── Threat Model Diagram ──
  if (record.components.length > 0) {
    lines.push('## Threat Model Diagram');
    lines.push('');
    lines.push('```mermaid');
    lines.push(generateMermaid(record));
    lines.push('```');
    lines.push('');
  }

  // ── Findings ──
  if (record.subjects.length > 0) {
    lines.push('## Findings');
    lines.push('');
    for (const s of record.subjects) {
      lines.push(`### ${singleLine(s.heading)}`);
      lines.push('');
      lines.push('| Category | Severity | Threat | Countermeasure |');
      lines.push('|----------|----------|--------|----------------|');
      for (const f of s.findings) {
        lines.push(`| ${f.category} | ${formatScore(f.band, f.severity)} | ${cell(f.description)} | ${cell(f.countermeasure)} |`);
      }
      lines.push('');
    }
  }

  // ── Diagnostics ──
  if (record.diagnostics.length > 0) {
    lines.push('## ⚠ Detection Diagnostics');
    lines.push('');
    for (const d of record.diagnostics) {
      const icon = d.level === 'warning' ? '⚠' : 'ℹ';
      lines.push(`- ${icon} \`${d.code}\` ${singleLine(d.message)}`);
    }
    lines.push('');
  }

  // ── Footer ──
  lines.push('---');
  lines.push('*Generated by StrideGraph — rule-based STRIDE analysis of detected architecture components.*');

  return lines.join('\n');
}

// ─── Helpers ─────────────────────────────────────────────────────────

export function formatScore(band: Severity, severity: number): string {
  return `${severityBadge(band)} (${severity.toFixed(3)})`;
}

/** Collapse line breaks so detected text cannot open new Markdown blocks */
export function singleLine(s: string): string {
  return s.replace(/\s*[\r\n]+\s*/g, ' ');
}

/** Keep free text inside a single table cell */
function cell(s: string): string {
  return singleLine(s.replace(/\|/g, '\\|'));
}
