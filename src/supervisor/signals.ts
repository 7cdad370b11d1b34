import { constants } from 'node:os';
import type { SignalName } from './types.js';

/**
 * Narrows a string to a signal name known to this platform.
 *
 * @example
 * ```typescript
 * isSignalName('SIGTERM'); // true
 * isSignalName('TERM'); // false
 * ```
 */
export function isSignalName(value: string): value is SignalName {
  return Object.prototype.hasOwnProperty.call(constants.signals, value);
}
