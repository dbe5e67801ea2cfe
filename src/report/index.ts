/**
 * StrideGraph Report — exports.
 *
 * Report generation is pure transformation; file writes belong to the CLI
 * and pipeline callers.
 */

export { composeReport, buildRecord, REPORT_SCHEMA_VERSION, DEFAULT_TITLE } from './compose.js';
export type { ReportContext } from './compose.js';
export { renderMarkdown, formatScore, singleLine } from './report.js';
export { generateMermaid } from './mermaid.js';
export { bandFor, severityBadge, meetsMinSeverity, SEVERITY_BANDS } from './severity.js';
