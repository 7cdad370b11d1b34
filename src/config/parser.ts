/**
 * TOML configuration parser for argpanel.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { DEFAULT_LOCALIZATION, isMessageId, type Localization, type MessageId } from '../orchestrator/messages.js';
import { isSignalName } from '../supervisor/signals.js';
import { DEFAULT_CONFIG, DEFAULT_FEATURES, DEFAULT_LOGGING, DEFAULT_PROCESS } from './defaults.js';
import type {
  Config,
  FeatureConfig,
  FeatureName,
  FeaturesConfig,
  LoggingConfig,
  ProcessConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'ConfigParseError';
  }
}

/**
 * Narrows a parsed TOML value to a table.
 */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Date) {
    return 'date';
  }
  return typeof value;
}

/**
 * Validates that a value is a table, treating a missing section as empty.
 *
 * @throws ConfigParseError if value is present but not a table.
 */
function validateSection(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`);
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`);
  }
  return value;
}

/**
 * Parses one feature switch: a boolean, or a description string that enables it.
 */
function parseFeature(value: unknown, fieldPath: string): FeatureConfig {
  if (typeof value === 'boolean') {
    return { enabled: value, description: undefined };
  }
  if (typeof value === 'string') {
    return { enabled: true, description: value };
  }
  throw new ConfigParseError(
    `Invalid type for '${fieldPath}': expected boolean or description string, got ${describeType(value)}`
  );
}

function parseFeatures(raw: Record<string, unknown> | undefined): FeaturesConfig {
  if (raw === undefined) {
    return DEFAULT_FEATURES;
  }

  const table = raw;
  const pick = (name: FeatureName): FeatureConfig =>
    name in table ? parseFeature(table[name], `features.${name}`) : DEFAULT_FEATURES[name];

  return { env: pick('env'), stdin: pick('stdin'), working_dir: pick('working_dir') };
}

function parseProcess(raw: Record<string, unknown> | undefined): ProcessConfig {
  if (raw === undefined) {
    return DEFAULT_PROCESS;
  }

  let result: ProcessConfig = DEFAULT_PROCESS;

  if ('kill_signal' in raw) {
    const signal = validateString(raw.kill_signal, 'process.kill_signal');
    if (!isSignalName(signal)) {
      throw new ConfigParseError(`Invalid value for 'process.kill_signal': unknown signal '${signal}'`);
    }
    result = { ...result, kill_signal: signal };
  }
  if ('kill_grace_ms' in raw) {
    result = { ...result, kill_grace_ms: validateNumber(raw.kill_grace_ms, 'process.kill_grace_ms') };
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  if (raw === undefined) {
    return DEFAULT_LOGGING;
  }
  if ('debug' in raw) {
    return { debug: validateBoolean(raw.debug, 'logging.debug') };
  }
  return DEFAULT_LOGGING;
}

/**
 * Overrides default message templates. Keys are message ids.
 *
 * @throws ConfigParseError for unknown ids and non-string templates.
 */
function parseLocalization(raw: Record<string, unknown> | undefined): Localization {
  if (raw === undefined) {
    return DEFAULT_LOCALIZATION;
  }

  const overrides: Partial<Record<MessageId, string>> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isMessageId(key)) {
      throw new ConfigParseError(`Unknown message id 'localization.${key}'`);
    }
    overrides[key] = validateString(value, `localization.${key}`);
  }
  return { ...DEFAULT_LOCALIZATION, ...overrides };
}

/**
 * Parses a TOML string into a Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [features]
 * env = "Variables passed to the tool"
 *
 * [process]
 * kill_grace_ms = 2000
 * `);
 * config.features.env; // { enabled: true, description: "Variables passed to the tool" }
 * config.process.kill_grace_ms; // 2000
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    features: parseFeatures(validateSection(parsed.features, 'features')),
    process: parseProcess(validateSection(parsed.process, 'process')),
    logging: parseLogging(validateSection(parsed.logging, 'logging')),
    localization: parseLocalization(validateSection(parsed.localization, 'localization')),
  };
}

/**
 * Returns the default configuration.
 */
export function getDefaultConfig(): Config {
  return DEFAULT_CONFIG;
}
