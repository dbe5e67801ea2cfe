/**
 * StrideGraph Config — Public API
 */

export {
  DEFAULT_ENGINE_CONFIG, DEFAULT_SEVERITY_WEIGHTS, DEFAULT_CANONICAL_DIRECTIONS, withDefaults,
} from './defaults.js';
export type { EngineConfigOverrides } from './defaults.js';
export {
  engineConfigSchema, parseEngineConfig, readConfigFile, readEnvConfig,
  resolveEngineConfig, projectConfigPath, PROJECT_CONFIG_DIR,
} from './config.js';
export type { EngineConfigInput, ResolveConfigOptions, ResolvedConfig, ThresholdFlags } from './config.js';
