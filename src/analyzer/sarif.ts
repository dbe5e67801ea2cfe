/**
 * StrideGraph SARIF — Convert a threat report to SARIF 2.1.0.
 *
 * SARIF (Static Analysis Results Interchange Format) is consumed by:
 *   - GitHub Advanced Security (code scanning alerts)
 *   - VS Code SARIF Viewer extension
 *   - Azure DevOps
 *
 * We emit results for:
 *   1. Threat findings, one rule per STRIDE category
 *   2. Detections skipped during normalization (warning diagnostics)
 *
 * There is no source line to point at: results carry the detection file as
 * artifact and the component or relationship as logical location.
 */

import type { ReportRecord, Severity, StrideCategory } from '../types/index.js';
import { STRIDE_CATEGORIES } from '../types/index.js';
import { meetsMinSeverity } from '../report/severity.js';
import { VERSION } from '../version.js';

// ─── SARIF 2.1.0 types (subset) ─────────────────────────────────────

type SarifLevel = 'error' | 'warning' | 'note';

export interface SarifLog {
  $schema: string;
  version: '2.1.0';
  runs: SarifRun[];
}

export interface SarifRun {
  tool: {
    driver: {
      name: string;
      version: string;
      rules: SarifRule[];
    };
  };
  results: SarifResult[];
}

export interface SarifRule {
  id: string;
  name: string;
  shortDescription: { text: string };
  fullDescription?: { text: string };
  defaultConfiguration: {
    level: SarifLevel;
  };
}

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations: SarifLocation[];
  properties?: Record<string, unknown>;
}

interface SarifLocation {
  physicalLocation?: {
    artifactLocation: { uri: string };
  };
  logicalLocations?: { name: string; kind: string }[];
}

// ─── Rule definitions ────────────────────────────────────────────────

export const SKIPPED_DETECTION_RULE = 'stride/detection-skipped';

const CATEGORY_TEXT: Record<StrideCategory, string> = {
  'Spoofing': 'An element can be impersonated by an attacker',
  'Tampering': 'Data or code handled by an element can be modified without authorization',
  'Repudiation': 'Actions can be performed without an attributable audit trail',
  'Information Disclosure': 'Data can be exposed to parties not authorized to read it',
  'Denial of Service': 'An element can be made unavailable to legitimate users',
  'Elevation of Privilege': 'An attacker can gain capabilities beyond those granted',
};

export function ruleIdFor(category: StrideCategory): string {
  return `stride/${category.toLowerCase().replace(/\s+/g, '-')}`;
}

const RULES: SarifRule[] = [
  ...STRIDE_CATEGORIES.map((category): SarifRule => ({
    id: ruleIdFor(category),
    name: category.replace(/\s+/g, ''),
    shortDescription: { text: CATEGORY_TEXT[category] },
    defaultConfiguration: { level: 'warning' },
  })),
  {
    id: SKIPPED_DETECTION_RULE,
    name: 'DetectionSkipped',
    shortDescription: { text: 'A detection was dropped before graph construction' },
    fullDescription: { text: 'The detection had an invalid confidence or bounding box and did not become a component. The threat model may be missing an element.' },
    defaultConfiguration: { level: 'warning' },
  },
];

// ─── Generator ───────────────────────────────────────────────────────

export interface SarifOptions {
  /** Include skipped-detection warnings as results */
  includeDiagnostics?: boolean;
  /** Only include findings at or above this band */
  minSeverity?: Severity;
}

export function levelFor(band: Severity): SarifLevel {
  if (band === 'critical' || band === 'high') return 'error';
  return band === 'medium' ? 'warning' : 'note';
}

export function generateSarif(record: ReportRecord, options: SarifOptions = {}): SarifLog {
  const { includeDiagnostics = true } = options;
  const artifact = record.source ?? undefined;
  const results: SarifResult[] = [];

  // ── Findings ──
  for (const s of record.subjects) {
    const logical = s.subject.kind === 'component'
      ? { name: s.subject.id, kind: 'component' }
      : { name: `${s.subject.sourceId}->${s.subject.targetId}`, kind: 'relationship' };

    for (const f of s.findings) {
      if (!meetsMinSeverity(f.band, options.minSeverity)) continue;
      results.push({
        ruleId: ruleIdFor(f.category),
        level: levelFor(f.band),
        message: { text: `${s.heading}: ${f.description}` },
        locations: [locationFrom(artifact, logical)],
        properties: {
          severity: f.severity,
          band: f.band,
          countermeasure: f.countermeasure,
          strideRules: f.ruleIds,
        },
      });
    }
  }

  // ── Skipped detections ──
  if (includeDiagnostics) {
    for (const d of record.diagnostics) {
      if (d.level !== 'warning') continue;
      results.push({
        ruleId: SKIPPED_DETECTION_RULE,
        level: 'warning',
        message: { text: d.message },
        locations: [locationFrom(artifact, { name: `detection[${d.index}]`, kind: 'element' })],
        properties: { code: d.code },
      });
    }
  }

  return {
    $schema: 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json',
    version: '2.1.0',
    runs: [{
      tool: {
        driver: {
          name: 'StrideGraph',
          version: VERSION,
          rules: RULES,
        },
      },
      results,
    }],
  };
}

// ─── Helpers ─────────────────────────────────────────────────────────

function locationFrom(file: string | undefined, logical: { name: string; kind: string }): SarifLocation {
  const loc: SarifLocation = { logicalLocations: [logical] };
  // SARIF uses forward-slash URIs
  if (file) loc.physicalLocation = { artifactLocation: { uri: file.replace(/\\/g, '/') } };
  return loc;
}
