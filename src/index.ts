/**
 * argpanel
 *
 * A runtime argument model for command-line interface definitions, and a
 * supervised runner for the child processes they describe.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './schema/index.js';
export * from './state/index.js';
export * from './assembler/index.js';
export * from './matcher/index.js';
export * from './supervisor/index.js';
export * from './orchestrator/index.js';
export * from './config/index.js';
export * from './runtime/index.js';
export { Logger, createLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
