/**
 * Deterministic ordering shared by the reasoner and the report composer.
 *
 * Component ids compare numeric-aware (C2 < C10); components come before
 * relationships; within a subject, severity descending then category name.
 */

import type { FindingSubject, ThreatFinding } from '../types/index.js';

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Numeric-aware id comparison, independent of the host locale. */
export function compareIds(a: string, b: string): number {
  const pa = splitId(a);
  const pb = splitId(b);
  return compareText(pa.prefix, pb.prefix) || pa.num - pb.num || compareText(a, b);
}

function splitId(id: string): { prefix: string; num: number } {
  const m = id.match(/^(.*?)(\d+)$/);
  return m ? { prefix: m[1], num: Number(m[2]) } : { prefix: id, num: -1 };
}

export function compareSubjects(a: FindingSubject, b: FindingSubject): number {
  if (a.kind !== b.kind) return a.kind === 'component' ? -1 : 1;
  if (a.kind === 'component' && b.kind === 'component') return compareIds(a.id, b.id);
  if (a.kind === 'relationship' && b.kind === 'relationship') {
    return compareIds(a.sourceId, b.sourceId) || compareIds(a.targetId, b.targetId);
  }
  return 0;
}

export function subjectKey(subject: FindingSubject): string {
  return subject.kind === 'component'
    ? `component:${subject.id}`
    : `relationship:${subject.sourceId}->${subject.targetId}`;
}

export function compareFindings(a: ThreatFinding, b: ThreatFinding): number {
  return compareSubjects(a.subject, b.subject)
    || b.severity - a.severity
    || compareText(a.category, b.category)
    || compareText(a.description, b.description);
}

export function sortFindings(findings: readonly ThreatFinding[]): ThreatFinding[] {
  return [...findings].sort(compareFindings);
}
