/**
 * Creation of argument states at their empty representation.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type { ArgSpec } from '../schema/types.js';
import type { ArgState, ValueEntry } from './types.js';

/**
 * Creates a value entry with a fresh identity.
 *
 * @param text - Initial text.
 * @returns The entry.
 */
export function createValueEntry(text = ''): ValueEntry {
  return { text, identity: randomUUID() };
}

/**
 * Creates the state for an argument: empty string, empty list, the flag's
 * resting value or `0`.
 *
 * Default values are not applied; they stay placeholders until a reset.
 *
 * @param spec - The argument spec.
 * @returns A state whose `kind` matches the spec's cardinality.
 */
export function createArgState(spec: ArgSpec): ArgState {
  switch (spec.cardinality) {
    case 'single':
      return { kind: 'single', spec, entry: createValueEntry(), validationError: undefined };
    case 'multiple':
      return { kind: 'multiple', spec, entries: [], validationError: undefined };
    case 'flag':
      return { kind: 'flag', spec, enabled: !spec.valueWhenPresent, validationError: undefined };
    case 'counter':
      return { kind: 'counter', spec, count: 0, validationError: undefined };
    default: {
      const exhaustiveCheck: never = spec;
      return exhaustiveCheck;
    }
  }
}

/**
 * Whether an argument state holds no user input.
 *
 * @param state - The argument state.
 * @returns True for an empty string, empty list, resting flag or zero counter.
 */
export function isArgStateEmpty(state: ArgState): boolean {
  switch (state.kind) {
    case 'single':
      return state.entry.text === '';
    case 'multiple':
      return state.entries.length === 0;
    case 'flag':
      return state.enabled !== state.spec.valueWhenPresent;
    case 'counter':
      return state.count === 0;
  }
}
