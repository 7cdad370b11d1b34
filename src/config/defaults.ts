/**
 * Default configuration values for argpanel.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_LOCALIZATION } from '../orchestrator/messages.js';
import { DEFAULT_KILL_GRACE_MS, DEFAULT_KILL_SIGNAL } from '../supervisor/child-process.js';
import type { Config, FeatureConfig, FeaturesConfig, LoggingConfig, ProcessConfig } from './types.js';

const DISABLED: FeatureConfig = { enabled: false, description: undefined };

/**
 * Default feature switches. Every optional run input is off.
 */
export const DEFAULT_FEATURES: FeaturesConfig = {
  env: DISABLED,
  stdin: DISABLED,
  working_dir: DISABLED,
};

/**
 * Default process settings.
 */
export const DEFAULT_PROCESS: ProcessConfig = {
  kill_signal: DEFAULT_KILL_SIGNAL,
  kill_grace_ms: DEFAULT_KILL_GRACE_MS,
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  features: DEFAULT_FEATURES,
  process: DEFAULT_PROCESS,
  logging: DEFAULT_LOGGING,
  localization: DEFAULT_LOCALIZATION,
};
