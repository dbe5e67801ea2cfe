/**
 * StrideGraph Analyzer — exports.
 *
 * SARIF generation is pure transformation; file writes are the caller's.
 */

export { generateSarif, levelFor, ruleIdFor, SKIPPED_DETECTION_RULE } from './sarif.js';
export type { SarifLog, SarifOptions, SarifResult, SarifRule, SarifRun } from './sarif.js';
