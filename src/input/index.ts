/**
 * StrideGraph Input — Public API
 */

export { detectionFileSchema, parseDetectionInput, loadDetectionFile, readDetectionFile } from './detections.js';
export type { DetectionInput } from './detections.js';
