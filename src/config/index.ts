/**
 * Configuration module for argpanel.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export { FEATURE_NAMES } from './types.js';
export type {
  Config,
  FeatureConfig,
  FeatureName,
  FeaturesConfig,
  LoggingConfig,
  PartialConfig,
  ProcessConfig,
} from './types.js';
export { DEFAULT_CONFIG, DEFAULT_FEATURES, DEFAULT_LOGGING, DEFAULT_PROCESS } from './defaults.js';
export {
  ConfigValidationError,
  MAX_KILL_GRACE_MS,
  NON_TERMINATING_SIGNALS,
  assertConfigValid,
  validateConfig,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { CONFIG_FILE_NAME, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
