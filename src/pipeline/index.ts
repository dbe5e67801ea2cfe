/**
 * StrideGraph Pipeline — Public API
 */

export { runAnalysis } from './run.js';
export type { AnalysisResult, RunOptions } from './run.js';
export { analyzeBatch, reportBaseName, reportStem, DETECTION_FILE_SUFFIX } from './batch.js';
export type { BatchFailure, BatchItem, BatchOptions, BatchResult } from './batch.js';
