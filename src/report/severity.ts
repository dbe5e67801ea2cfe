import type { Severity } from '../types/index.js';

export const SEVERITY_BANDS: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

/** Lower bound of each band; anything under 0.25 is low. */
const BAND_FLOORS: readonly [Severity, number][] = [
  ['critical', 0.75],
  ['high', 0.5],
  ['medium', 0.25],
];

export function bandFor(severity: number): Severity {
  for (const [band, floor] of BAND_FLOORS) {
    if (severity >= floor) return band;
  }
  return 'low';
}

export function severityBadge(sev: Severity | null): string {
  switch (sev) {
    case 'critical': return '🔴 Critical';
    case 'high':     return '🟠 High';
    case 'medium':   return '🟡 Medium';
    case 'low':      return '🔵 Low';
    default:         return '⚪ None';
  }
}

const SEV_ORDER: Record<Severity, number> = { critical: 0, high: 1, medium: 2, low: 3 };

export function meetsMinSeverity(actual: Severity, min?: Severity): boolean {
  if (!min) return true;
  return SEV_ORDER[actual] <= SEV_ORDER[min];
}
