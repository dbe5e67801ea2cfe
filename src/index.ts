/**
 * StrideGraph — library entry point.
 *
 * Usage:
 *   import { buildThreatGraph, analyze, composeReport, defaultRuleTable } from 'stridegraph';
 *   import { runAnalysis, loadDetectionFile } from 'stridegraph';
 *   import type { ThreatGraph, ThreatFinding, ReportRecord } from 'stridegraph';
 */

export * from './types/index.js';
export * from './errors.js';
export * from './normalizer/index.js';
export * from './graph/index.js';
export * from './rules/index.js';
export * from './reasoner/index.js';
export * from './report/index.js';
export * from './config/index.js';
export * from './input/index.js';
export * from './pipeline/index.js';
export { generateSarif, levelFor, ruleIdFor, SKIPPED_DETECTION_RULE } from './analyzer/index.js';
export type { SarifLog, SarifOptions } from './analyzer/index.js';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
export { VERSION } from './version.js';
