/**
 * StrideGraph Reasoner — Public API
 */

export { analyze, severityScore, roundSeverity, nodeFields, edgeFields } from './stride.js';
export type { AnalyzeOptions } from './stride.js';
export { compareFindings, compareIds, compareSubjects, compareText, sortFindings, subjectKey } from './order.js';
