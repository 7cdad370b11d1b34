/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond type checking:
 * - The kill signal actually stops a process
 * - The kill grace period is a sane number of milliseconds
 * - Feature descriptions and message templates are not blank
 *
 * @packageDocumentation
 */

import { MESSAGE_IDS } from '../orchestrator/messages.js';
import { FEATURE_NAMES, type Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Signals whose default action does not terminate a process.
 */
export const NON_TERMINATING_SIGNALS: ReadonlySet<string> = new Set([
  'SIGCHLD',
  'SIGCONT',
  'SIGSTOP',
  'SIGTSTP',
  'SIGTTIN',
  'SIGTTOU',
  'SIGURG',
  'SIGWINCH',
]);

/** Longest accepted kill grace period: one hour. */
export const MAX_KILL_GRACE_MS = 3_600_000;

function validateProcess(config: Config, errors: ValidationError[]): void {
  const { kill_signal: killSignal, kill_grace_ms: killGraceMs } = config.process;

  if (NON_TERMINATING_SIGNALS.has(killSignal)) {
    errors.push({
      field: 'process.kill_signal',
      value: killSignal,
      message: `'process.kill_signal' must terminate the process, ${killSignal} does not`,
    });
  }

  if (!Number.isInteger(killGraceMs) || killGraceMs < 0) {
    errors.push({
      field: 'process.kill_grace_ms',
      value: killGraceMs,
      message: `'process.kill_grace_ms' must be a non-negative integer, got ${String(killGraceMs)}`,
    });
  } else if (killGraceMs > MAX_KILL_GRACE_MS) {
    errors.push({
      field: 'process.kill_grace_ms',
      value: killGraceMs,
      message: `'process.kill_grace_ms' exceeds reasonable maximum of ${String(MAX_KILL_GRACE_MS)} (1 hour)`,
    });
  }
}

function validateFeatures(config: Config, errors: ValidationError[]): void {
  for (const name of FEATURE_NAMES) {
    const description = config.features[name].description;
    if (description?.trim() === '') {
      errors.push({
        field: `features.${name}`,
        value: description,
        message: `'features.${name}' description must not be blank; use true to enable without one`,
      });
    }
  }
}

function validateLocalization(config: Config, errors: ValidationError[]): void {
  for (const id of MESSAGE_IDS) {
    const template = config.localization[id];
    if (template.trim() === '') {
      errors.push({
        field: `localization.${id}`,
        value: template,
        message: `Message 'localization.${id}' must not be blank`,
      });
    }
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with every error found.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateProcess(config, errors);
  validateFeatures(config, errors);
  validateLocalization(config, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
