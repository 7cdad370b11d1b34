/**
 * Configuration types for argpanel.toml parsing.
 *
 * @packageDocumentation
 */

import type { Localization } from '../orchestrator/messages.js';
import type { SignalName } from '../supervisor/types.js';

/**
 * Optional run inputs a presentation layer can offer.
 *
 * - `env`: environment variable overrides
 * - `stdin`: standard input text or file
 * - `working_dir`: working directory
 */
export type FeatureName = 'env' | 'stdin' | 'working_dir';

/**
 * All feature names.
 */
export const FEATURE_NAMES: readonly FeatureName[] = ['env', 'stdin', 'working_dir'] as const;

/**
 * Whether a run input is offered, with an optional explanatory text.
 *
 * In TOML a feature is either a boolean or a description string; a string
 * enables the feature and is shown next to it.
 */
export interface FeatureConfig {
  readonly enabled: boolean;
  readonly description: string | undefined;
}

/**
 * The `[features]` section.
 */
export type FeaturesConfig = Readonly<Record<FeatureName, FeatureConfig>>;

/**
 * The `[process]` section: how running children are stopped.
 */
export interface ProcessConfig {
  /** Signal sent first when a child is killed (default: SIGTERM). */
  readonly kill_signal: SignalName;
  /** Milliseconds before escalating to SIGKILL (default: 5000). */
  readonly kill_grace_ms: number;
}

/**
 * The `[logging]` section.
 */
export interface LoggingConfig {
  /** Whether debug-level log entries are written. */
  readonly debug: boolean;
}

/**
 * Complete configuration object parsed from argpanel.toml.
 */
export interface Config {
  readonly features: FeaturesConfig;
  readonly process: ProcessConfig;
  readonly logging: LoggingConfig;
  /** Message table, the defaults overridden by `[localization]`. */
  readonly localization: Localization;
}

/**
 * Values that can be overridden from the environment.
 */
export interface PartialConfig {
  features?: Partial<Record<FeatureName, boolean>>;
  process?: Partial<ProcessConfig>;
  logging?: Partial<LoggingConfig>;
}
