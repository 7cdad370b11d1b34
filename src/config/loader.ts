/**
 * Loads the effective configuration for a run.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { createLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/** File name looked up in the working directory. */
export const CONFIG_FILE_NAME = 'argpanel.toml';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Directory holding the configuration file. Defaults to `process.cwd()`. */
  readonly cwd?: string;
  /** Environment to read overrides from. Defaults to `process.env`. */
  readonly env?: EnvRecord;
  /** @defaultValue 'argpanel.toml' */
  readonly fileName?: string;
  readonly logger?: Logger;
}

/**
 * Reads the configuration file when present, then applies environment overrides
 * and validates the result.
 *
 * A file that cannot be parsed is reported as a warning and replaced by the
 * defaults.
 *
 * @throws EnvCoercionError if an override cannot be coerced.
 * @throws ConfigValidationError if the effective configuration is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const logger = options.logger ?? createLogger('Config');
  const configFilePath = path.join(options.cwd ?? process.cwd(), options.fileName ?? CONFIG_FILE_NAME);

  let config = DEFAULT_CONFIG;
  if (existsSync(configFilePath)) {
    try {
      config = parseConfig(readFileSync(configFilePath, 'utf-8'));
      logger.debug('config_loaded', { path: configFilePath });
    } catch (error) {
      if (!(error instanceof ConfigParseError)) {
        throw error;
      }
      logger.warn('config_invalid', { path: configFilePath, message: error.message, fallback: 'defaults' });
    }
  }

  const effective = applyEnvOverrides(config, options.env ?? process.env);
  assertConfigValid(effective);
  return effective;
}
