/**
 * Type definitions for the mutable argument state.
 *
 * @packageDocumentation
 */

import type {
  CounterArgSpec,
  FlagArgSpec,
  MultipleArgSpec,
  SingleArgSpec,
} from '../schema/types.js';

/**
 * One editable text value.
 *
 * `identity` is a synthetic key that lets a presentation layer keep widgets
 * stable across redraws. It is never serialized into an argument vector.
 */
export interface ValueEntry {
  text: string;
  readonly identity: string;
}

/**
 * State of an argument taking one value.
 */
export interface SingleArgState {
  readonly kind: 'single';
  readonly spec: SingleArgSpec;
  entry: ValueEntry;
  validationError: string | undefined;
}

/**
 * State of an argument taking any number of values.
 */
export interface MultipleArgState {
  readonly kind: 'multiple';
  readonly spec: MultipleArgSpec;
  entries: ValueEntry[];
  validationError: string | undefined;
}

/**
 * State of a boolean switch.
 */
export interface FlagArgState {
  readonly kind: 'flag';
  readonly spec: FlagArgSpec;
  /** Value the program sees. The token is emitted when it equals `spec.valueWhenPresent`. */
  enabled: boolean;
  validationError: string | undefined;
}

/**
 * State of an occurrence counter. `count` never drops below zero.
 */
export interface CounterArgState {
  readonly kind: 'counter';
  readonly spec: CounterArgSpec;
  count: number;
  validationError: string | undefined;
}

/**
 * Mutable runtime value of one argument plus its transient validation error.
 */
export type ArgState = SingleArgState | MultipleArgState | FlagArgState | CounterArgState;

/**
 * Kind discriminant of {@link ArgState}.
 */
export type ArgStateKind = ArgState['kind'];

