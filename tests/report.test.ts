import { describe, it, expect } from 'vitest';
import { composeReport, buildRecord } from '../src/report/compose.js';
import { formatScore } from '../src/report/report.js';
import { generateMermaid } from '../src/report/mermaid.js';
import { bandFor, meetsMinSeverity } from '../src/report/severity.js';
import { buildThreatGraph } from '../src/graph/build.js';
import { analyze } from '../src/reasoner/stride.js';
import { defaultRuleTable } from '../src/rules/table.js';
import { SQUARE, det, threeInARow, userAndApi } from './fixtures/detections.js';

function reportFor(detections = userAndApi) {
  const graph = buildThreatGraph(detections, SQUARE);
  const findings = analyze(graph, defaultRuleTable());
  return { graph, findings, report: composeReport(findings, { graph, title: 'Checkout', source: 'checkout.png', ruleTableVersion: '1.0.0' }) };
}

// ─── Bands ───────────────────────────────────────────────────────────

describe('bandFor', () => {
  it('maps scores to bands at the documented floors', () => {
    expect(bandFor(0.75)).toBe('critical');
    expect(bandFor(0.749)).toBe('high');
    expect(bandFor(0.5)).toBe('high');
    expect(bandFor(0.25)).toBe('medium');
    expect(bandFor(0.249)).toBe('low');
    expect(bandFor(0)).toBe('low');
  });

  it('filters by minimum band', () => {
    expect(meetsMinSeverity('critical', 'high')).toBe(true);
    expect(meetsMinSeverity('medium', 'high')).toBe(false);
    expect(meetsMinSeverity('low')).toBe(true);
  });
});

// ─── Record ──────────────────────────────────────────────────────────

describe('composeReport record', () => {
  it('summarizes a User → API diagram', () => {
    const { record } = reportFor().report;
    expect(record.title).toBe('Checkout');
    expect(record.source).toBe('checkout.png');
    expect(record.summary.components).toBe(2);
    expect(record.summary.relationships).toBe(1);
    expect(record.summary.findings).toBe(9);
    expect(record.summary.overallRisk).toBe('critical');
    expect(record.summary.highestSeverity).toEqual({
      subject: { kind: 'component', id: 'C2' },
      heading: 'C2 · API "api"',
      category: 'Elevation of Privilege',
      severity: 0.95,
      band: 'critical',
    });
    expect(record.summary.bySeverity).toEqual({ critical: 3, high: 4, medium: 2, low: 0 });
    expect(record.summary.byCategory).toEqual({
      'Spoofing': 3,
      'Tampering': 1,
      'Repudiation': 2,
      'Information Disclosure': 1,
      'Denial of Service': 1,
      'Elevation of Privilege': 1,
    });
    expect(record.summary.executiveSummary).toBe(
      '2 components and 1 relationship produced 9 findings; overall risk is Critical. Most frequent category: Spoofing (3).',
    );
  });

  it('groups findings by subject in report order', () => {
    const { record } = reportFor().report;
    expect(record.subjects.map(s => s.heading)).toEqual(['C1 · User "user"', 'C2 · API "api"', 'C1 → C2']);
    expect(record.subjects[2].findings.map(f => f.band)).toEqual(['high', 'high', 'high', 'medium']);
  });

  it('marks undirected relationships in headings', () => {
    const { record } = reportFor(threeInARow).report;
    expect(record.subjects.map(s => s.heading).slice(-2)).toEqual(['C1 → C2', 'C2 ↔ C3']);
  });

  it('keeps severities non-increasing within each subject', () => {
    const { record } = reportFor(threeInARow).report;
    for (const s of record.subjects) {
      for (let i = 1; i < s.findings.length; i++) {
        expect(s.findings[i].severity).toBeLessThanOrEqual(s.findings[i - 1].severity);
      }
    }
  });

  it('derives counts from the findings when no graph is given', () => {
    const { findings } = reportFor();
    const record = buildRecord(findings);
    expect(record.summary.components).toBe(2);
    expect(record.summary.relationships).toBe(1);
    expect(record.title).toBe('Architecture Diagram');
    expect(record.components).toEqual([]);
    expect(record.subjects.map(s => s.heading)).toEqual(['C1', 'C2', 'C1 → C2']);
  });
});

// ─── Empty ───────────────────────────────────────────────────────────

describe('empty report', () => {
  const graph = buildThreatGraph([], SQUARE);
  const { markdown, record } = composeReport(analyze(graph, defaultRuleTable()), { graph });

  it('has zero counts and no subjects', () => {
    expect(record.summary).toEqual({
      components: 0,
      relationships: 0,
      findings: 0,
      highestSeverity: null,
      overallRisk: null,
      bySeverity: { critical: 0, high: 0, medium: 0, low: 0 },
      byCategory: {
        'Spoofing': 0,
        'Tampering': 0,
        'Repudiation': 0,
        'Information Disclosure': 0,
        'Denial of Service': 0,
        'Elevation of Privilege': 0,
      },
      executiveSummary: 'No components were detected in the diagram.',
    });
    expect(record.subjects).toEqual([]);
  });

  it('says so in the Markdown and renders no finding sections', () => {
    const lines = markdown.split('\n');
    expect(lines).toContain('No components were detected in the diagram.');
    expect(lines).toContain('| Components | 0 |');
    expect(lines).toContain('| **Findings** | **0** |');
    expect(lines).toContain('| Overall risk | ⚪ None |');
    expect(lines).not.toContain('## Findings');
    expect(lines).not.toContain('## Risk Matrix');
  });
});

// ─── Markdown ────────────────────────────────────────────────────────

describe('composeReport markdown', () => {
  it('renders the header, summary and finding rows', () => {
    const lines = reportFor().report.markdown.split('\n');
    expect(lines[0]).toBe('# STRIDE Threat Model Report — Checkout');
    expect(lines).toContain('> Source: `checkout.png`  ');
    expect(lines).toContain('| Overall risk | 🔴 Critical |');
    expect(lines).toContain('| Highest severity | 🔴 Critical (0.950) — Elevation of Privilege on C2 · API "api" |');
    expect(lines).toContain('### C1 → C2');
    expect(lines).toContain(
      '| Spoofing | 🟠 High (0.687) | Requests from user (C1) to api (C2) can be sent by an impersonator. '
      + '| Authenticate C1 on every request to C2 and bind sessions to the client. |',
    );
    expect(lines).toContain('| C1 | C2 | directed | 0.86 |');
    expect(lines).toContain('| C1 | User | user | 0.90 | 0.100, 0.100, 0.100, 0.100 |');
  });

  it('agrees with the record finding for finding', () => {
    const { markdown, record } = reportFor(threeInARow).report;
    const lines = markdown.split('\n');
    for (const s of record.subjects) {
      const at = lines.indexOf(`### ${s.heading}`);
      expect(at).toBeGreaterThan(-1);
      const rows = lines.slice(at + 4, at + 4 + s.findings.length);
      expect(rows.map(r => r.split(' | ').slice(0, 2).join(' | '))).toEqual(
        s.findings.map(f => `| ${f.category} | ${formatScore(f.band, f.severity)}`),
      );
    }
  });

  it('escapes pipes in labels', () => {
    const { markdown } = reportFor([det('a|b', 0.9, 100, 100)]).report;
    expect(markdown.split('\n')).toContain('| C1 | Unknown | a\\|b | 0.90 | 0.100, 0.100, 0.100, 0.100 |');
  });

  it('keeps multi-line labels on one Markdown line', () => {
    const { report } = reportFor([det('web\n## Findings', 0.9, 100, 100)]);
    const lines = report.markdown.split('\n');
    expect(report.record.subjects[0].heading).toBe('C1 · Unknown "web ## Findings"');
    expect(lines).toContain('### C1 · Unknown "web ## Findings"');
    expect(lines.filter(l => l === '## Findings')).toHaveLength(1);
    expect(lines).toContain(
      '- ℹ `unknown-label` Detection #0: label "web ## Findings" is not a known component type, classified as Unknown',
    );
  });

  it('lists diagnostics', () => {
    const { markdown } = reportFor([det('server', 1.2, 100, 100)]).report;
    expect(markdown.split('\n')).toContain(
      '- ⚠ `invalid-confidence` Detection #0 (server) skipped: confidence 1.2 is outside [0,1]',
    );
  });

  it('is byte-identical across runs and input orderings', () => {
    const a = reportFor(threeInARow).report.markdown;
    const b = reportFor([...threeInARow].reverse()).report.markdown;
    expect(b).toBe(a);
    const { graph, findings } = reportFor(threeInARow);
    const shuffled = [...findings].reverse();
    expect(composeReport(shuffled, { graph, title: 'Checkout', source: 'checkout.png', ruleTableVersion: '1.0.0' }).markdown).toBe(a);
  });
});

// ─── Mermaid ─────────────────────────────────────────────────────────

describe('generateMermaid', () => {
  it('draws shapes per type and marks critical components', () => {
    const { record } = reportFor(threeInARow).report;
    expect(generateMermaid(record).split('\n')).toEqual([
      'graph LR',
      '  C1(("C1: user (User)"))',
      '  C2["C2: api (API)"]',
      '  C3[("C3: database (Database)")]',
      '',
      '  C1 -->|"0.79"| C2',
      '  C2 ---|"0.65"| C3',
      '',
      '  style C2 stroke:#e74c3c,stroke-width:2px',
      '  style C3 stroke:#e74c3c,stroke-width:2px',
    ]);
  });
});
