/**
 * Environment variable overrides for configuration.
 *
 * ARGPANEL_* environment variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isSignalName } from '../supervisor/signals.js';
import type { SignalName } from '../supervisor/types.js';
import type { Config, FeatureName, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Readonly<Record<string, string | undefined>>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * One supported environment variable: how to coerce it and where it goes.
 */
type EnvVarMapping =
  | {
      readonly type: 'boolean';
      readonly description: string;
      readonly set: (overrides: PartialConfig, value: boolean) => void;
    }
  | {
      readonly type: 'number';
      readonly description: string;
      readonly set: (overrides: PartialConfig, value: number) => void;
    }
  | {
      readonly type: 'signal';
      readonly description: string;
      readonly set: (overrides: PartialConfig, value: SignalName) => void;
    };

function featureMapping(feature: FeatureName, label: string): EnvVarMapping {
  return {
    type: 'boolean',
    description: `Enable or disable the ${label} input (true/false)`,
    set: (overrides, value): void => {
      const features: Partial<Record<FeatureName, boolean>> = { ...overrides.features };
      features[feature] = value;
      overrides.features = features;
    },
  };
}

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  ARGPANEL_DEBUG: {
    type: 'boolean',
    description: 'Write debug-level log entries (true/false)',
    set: (overrides, value): void => {
      overrides.logging = { ...overrides.logging, debug: value };
    },
  },
  ARGPANEL_KILL_SIGNAL: {
    type: 'signal',
    description: 'Signal sent first when a child is killed, such as SIGINT',
    set: (overrides, value): void => {
      overrides.process = { ...overrides.process, kill_signal: value };
    },
  },
  ARGPANEL_KILL_GRACE_MS: {
    type: 'number',
    description: 'Milliseconds to wait before escalating a kill to SIGKILL',
    set: (overrides, value): void => {
      overrides.process = { ...overrides.process, kill_grace_ms: value };
    },
  },
  ARGPANEL_FEATURES_ENV: featureMapping('env', 'environment variables'),
  ARGPANEL_FEATURES_STDIN: featureMapping('stdin', 'standard input'),
  ARGPANEL_FEATURES_WORKING_DIR: featureMapping('working_dir', 'working directory'),
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to a signal name. `sigint` and `INT` both become `SIGINT`.
 *
 * @throws EnvCoercionError if no such signal exists.
 */
function coerceToSignal(value: string, envVar: string): SignalName {
  const upper = value.trim().toUpperCase();
  const candidate = upper.startsWith('SIG') ? upper : `SIG${upper}`;

  if (!isSignalName(candidate)) {
    throw new EnvCoercionError(envVar, value, 'signal name');
  }
  return candidate;
}

function applyMapping(overrides: PartialConfig, mapping: EnvVarMapping, value: string, envVar: string): void {
  switch (mapping.type) {
    case 'boolean':
      mapping.set(overrides, coerceToBoolean(value, envVar));
      return;
    case 'number':
      mapping.set(overrides, coerceToNumber(value, envVar));
      return;
    case 'signal':
      mapping.set(overrides, coerceToSignal(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing the first.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError on the first bad value unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ ARGPANEL_DEBUG: 'yes' });
 * result.overrides.logging?.debug; // true
 * result.appliedVars; // ["ARGPANEL_DEBUG"]
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * A feature switched on from the environment keeps its configured description.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  const feature = (name: FeatureName): Config['features'][FeatureName] => {
    const enabled = partial.features?.[name];
    return enabled === undefined ? base.features[name] : { ...base.features[name], enabled };
  };

  return {
    features: { env: feature('env'), stdin: feature('stdin'), working_dir: feature('working_dir') },
    process: { ...base.process, ...partial.process },
    logging: { ...base.logging, ...partial.logging },
    localization: base.localization,
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * Override precedence: env > config
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, mapping]) => [
      envVar,
      { description: mapping.description, type: mapping.type },
    ])
  );
}
