/**
 * StrideGraph — Core type definitions.
 */

// ─── Enums ───────────────────────────────────────────────────────────

export const COMPONENT_TYPES = ['Server', 'Database', 'User', 'LoadBalancer', 'API', 'Unknown'] as const;

export type ComponentType = typeof COMPONENT_TYPES[number];

export const STRIDE_CATEGORIES = [
  'Spoofing',
  'Tampering',
  'Repudiation',
  'Information Disclosure',
  'Denial of Service',
  'Elevation of Privilege',
] as const;

export type StrideCategory = typeof STRIDE_CATEGORIES[number];

export const RULE_ROLES = ['Node', 'EdgeSource', 'EdgeTarget'] as const;

export type RuleRole = typeof RULE_ROLES[number];

export type RelationshipKind = 'CommunicatesWith';

export type Severity = 'critical' | 'high' | 'medium' | 'low';

// ─── Geometry ────────────────────────────────────────────────────────

/** Top-left origin rectangle. */
export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ImageDimensions {
  width: number;
  height: number;
}

// ─── Detections & Components ─────────────────────────────────────────

/** One raw output of the vision model, bbox in pixels of the source image. */
export interface RawDetection {
  label: string;
  confidence: number;
  bbox: BoundingBox;
}

export interface DetectedComponent {
  readonly id: string;
  readonly type: ComponentType;
  /** Label the detector reported, before alias mapping */
  readonly label: string;
  /** Normalized to [0,1] image space */
  readonly boundingBox: Readonly<BoundingBox>;
  readonly confidence: number;
}

export interface Relationship {
  readonly sourceId: string;
  readonly targetId: string;
  readonly kind: RelationshipKind;
  /** false: one unordered edge, sourceId is the lower-ordered endpoint */
  readonly directed: boolean;
  readonly confidence: number;
}

// ─── Diagnostics ─────────────────────────────────────────────────────

export type DiagnosticCode =
  | 'malformed-bbox'
  | 'invalid-confidence'
  | 'low-confidence'
  | 'unknown-label'
  | 'merged-duplicate';

export interface NormalizeDiagnostic {
  level: 'warning' | 'info';
  code: DiagnosticCode;
  message: string;
  /** Position of the detection in the input sequence */
  index: number;
  label?: string;
}

export interface NormalizeResult {
  components: DetectedComponent[];
  diagnostics: NormalizeDiagnostic[];
}

// ─── Graph ───────────────────────────────────────────────────────────

export interface ThreatGraph {
  readonly components: readonly DetectedComponent[];
  readonly relationships: readonly Relationship[];
  /** Component id → ids one edge away; undirected edges listed both ways */
  readonly adjacency: Readonly<Record<string, readonly string[]>>;
  readonly diagnostics: readonly NormalizeDiagnostic[];
}

// ─── Rules ───────────────────────────────────────────────────────────

export interface RuleEntry {
  readonly id: string;
  readonly componentType: ComponentType;
  readonly role: RuleRole;
  readonly category: StrideCategory;
  readonly descriptionTemplate: string;
  readonly countermeasureTemplate: string;
}

export interface RuleTable {
  readonly version: string;
  readonly entries: readonly RuleEntry[];
  /** Rows for (type, role) in table order; the backing index is not reachable */
  readonly rows: (type: ComponentType, role: RuleRole) => readonly RuleEntry[];
}

// ─── Findings ────────────────────────────────────────────────────────

export type FindingSubject =
  | { kind: 'component'; id: string }
  | { kind: 'relationship'; sourceId: string; targetId: string };

export interface ThreatFinding {
  subject: FindingSubject;
  category: StrideCategory;
  description: string;
  countermeasure: string;
  severity: number;
  ruleIds: string[];
}

// ─── Configuration ───────────────────────────────────────────────────

export type SeverityWeights = Record<StrideCategory, number>;

export interface EngineConfig {
  confidenceThreshold: number;
  iouThreshold: number;
  proximityThreshold: number;
  severityWeights: SeverityWeights;
  /** Extra label aliases, keyed by raw label; merged over the built-in table */
  labelAliases: Record<string, ComponentType>;
  /** [source, target] type pairs that orient an inferred edge */
  canonicalDirections: [ComponentType, ComponentType][];
}

// ─── Report ──────────────────────────────────────────────────────────

export interface FindingRecord {
  category: StrideCategory;
  severity: number;
  band: Severity;
  description: string;
  countermeasure: string;
  ruleIds: string[];
}

export interface SubjectRecord {
  subject: FindingSubject;
  /** Human heading, e.g. `C1 · User "browser"` or `C1 → C2` */
  heading: string;
  findings: FindingRecord[];
}

export interface HighestSeverityRecord {
  subject: FindingSubject;
  heading: string;
  category: StrideCategory;
  severity: number;
  band: Severity;
}

export interface ReportSummary {
  components: number;
  relationships: number;
  findings: number;
  highestSeverity: HighestSeverityRecord | null;
  overallRisk: Severity | null;
  bySeverity: Record<Severity, number>;
  byCategory: Record<StrideCategory, number>;
  executiveSummary: string;
}

export interface ReportRecord {
  schemaVersion: string;
  title: string;
  source: string | null;
  ruleTableVersion: string | null;
  summary: ReportSummary;
  components: DetectedComponent[];
  relationships: Relationship[];
  subjects: SubjectRecord[];
  diagnostics: NormalizeDiagnostic[];
}

export interface ComposedReport {
  markdown: string;
  record: ReportRecord;
}
