/**
 * Type definitions for command definitions and the argument spec model.
 *
 * A {@link CommandDefinition} is what a host application hands over: a plain,
 * already-parsed description of its command line. {@link buildCommandSpec}
 * turns it into the immutable {@link CommandSpec} tree the rest of the library
 * works from.
 *
 * @packageDocumentation
 */

/**
 * Declared action semantics of an argument.
 *
 * - `set`: accumulate one value
 * - `append`: accumulate many values
 * - `set-true`: boolean switch, off until its token is given
 * - `set-false`: boolean switch, on until its token is given
 * - `count`: increment on every repetition
 */
export type ArgAction = 'set' | 'append' | 'set-true' | 'set-false' | 'count';

/**
 * All supported argument actions.
 */
export const ARG_ACTIONS: readonly ArgAction[] = ['set', 'append', 'set-true', 'set-false', 'count'] as const;

/**
 * Type guard for action names arriving from untyped host input.
 */
export function isArgAction(value: string): value is ArgAction {
  return ARG_ACTIONS.some((action) => action === value);
}

/**
 * Hint describing what kind of filesystem path a value is, as declared by the host.
 */
export type ValueHint = 'none' | 'file' | 'directory' | 'any-path';

/**
 * Path hint attached to an argument spec. Only the presentation layer reads it,
 * to decide whether to offer file or folder pickers.
 */
export type PathHint = 'none' | 'file' | 'directory' | 'either';

/**
 * One argument as declared by the host application.
 */
export interface ArgDefinition {
  /** Stable identifier, unique within its command. */
  readonly id: string;
  /** Long spelling without leading dashes (`verbose` for `--verbose`). */
  readonly long?: string;
  /** Short spelling, a single character without the dash (`v` for `-v`). */
  readonly short?: string;
  /** One-line help text. */
  readonly help?: string;
  /** Extended help text; preferred over `help` when both are set. */
  readonly longHelp?: string;
  /** Whether a value must be supplied. */
  readonly required?: boolean;
  /** Whether the value must be joined to its token with `=`. */
  readonly requireEquals?: boolean;
  /** Action semantics. Defaults to `set`. */
  readonly action?: ArgAction;
  /** Default values, used as placeholders and reset targets. */
  readonly defaultValues?: readonly string[];
  /** Closed set of accepted values. */
  readonly possibleValues?: readonly string[];
  /** Filesystem hint for the value. */
  readonly valueHint?: ValueHint;
}

/**
 * One command (or sub-command alternative) as declared by the host application.
 */
export interface CommandDefinition {
  /** Program name for the root command, sub-command name otherwise. */
  readonly name: string;
  /** Help text for the command. */
  readonly about?: string;
  /** Arguments in declaration order. */
  readonly args?: readonly ArgDefinition[];
  /** Named sub-command alternatives. */
  readonly subcommands?: readonly CommandDefinition[];
  /** Whether one of the sub-commands must be chosen. */
  readonly subcommandRequired?: boolean;
}

/**
 * Fields shared by every argument spec.
 */
interface ArgSpecBase {
  readonly id: string;
  /** Human label derived from `id`. */
  readonly displayName: string;
  /** Every accepted spelling, long form first. */
  readonly spellings: readonly string[];
  readonly helpText: string | undefined;
  readonly required: boolean;
  readonly useEquals: boolean;
  readonly defaultValues: readonly string[];
  readonly allowedValues: readonly string[];
  readonly pathHint: PathHint;
}

/**
 * An argument taking one value. Positional when it has no token.
 */
export interface SingleArgSpec extends ArgSpecBase {
  readonly cardinality: 'single';
  readonly invocationToken: string | undefined;
}

/**
 * An argument taking any number of values. Positional when it has no token.
 */
export interface MultipleArgSpec extends ArgSpecBase {
  readonly cardinality: 'multiple';
  readonly invocationToken: string | undefined;
}

/**
 * A boolean switch. Always has a token.
 */
export interface FlagArgSpec extends ArgSpecBase {
  readonly cardinality: 'flag';
  readonly invocationToken: string;
  /** Value the switch takes when its token is given; it holds the opposite otherwise. */
  readonly valueWhenPresent: boolean;
}

/**
 * An occurrence counter such as `-vvv`. Always has a token.
 */
export interface CounterArgSpec extends ArgSpecBase {
  readonly cardinality: 'counter';
  readonly invocationToken: string;
}

/**
 * Immutable description of one argument.
 */
export type ArgSpec = SingleArgSpec | MultipleArgSpec | FlagArgSpec | CounterArgSpec;

/**
 * Cardinality discriminant of {@link ArgSpec}.
 */
export type Cardinality = ArgSpec['cardinality'];

/**
 * Immutable description of one command and, recursively, its sub-commands.
 */
export interface CommandSpec {
  readonly name: string;
  readonly displayName: string;
  readonly about: string | undefined;
  readonly args: readonly ArgSpec[];
  readonly subcommands: readonly CommandSpec[];
  readonly subcommandRequired: boolean;
}
