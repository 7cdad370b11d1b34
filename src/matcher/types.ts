/**
 * Type definitions for matching an argument vector against a command spec.
 *
 * @packageDocumentation
 */

import type { ArgMatches } from './arg-matches.js';

/**
 * Why an argument vector does not fit its command spec.
 *
 * Every variant carries `path`, the sub-command names from the root to the
 * command the failure belongs to.
 */
export type MatchError =
  | { readonly kind: 'unknown-argument'; readonly token: string; readonly path: readonly string[] }
  | { readonly kind: 'missing-value'; readonly argId: string; readonly path: readonly string[] }
  | { readonly kind: 'equals-required'; readonly argId: string; readonly path: readonly string[] }
  | { readonly kind: 'unexpected-value'; readonly argId: string; readonly path: readonly string[] }
  | {
      readonly kind: 'invalid-value';
      readonly argId: string;
      readonly value: string;
      readonly allowed: readonly string[];
      readonly path: readonly string[];
    }
  | { readonly kind: 'missing-required'; readonly argId: string; readonly path: readonly string[] }
  | { readonly kind: 'missing-subcommand'; readonly path: readonly string[] }
  | { readonly kind: 'unexpected-positional'; readonly token: string; readonly path: readonly string[] };

/**
 * Discriminant of {@link MatchError}.
 */
export type MatchErrorKind = MatchError['kind'];

/**
 * Result of {@link matchArgs}.
 */
export type MatchResult =
  | { readonly success: true; readonly matches: ArgMatches }
  | { readonly success: false; readonly error: MatchError };

/**
 * Matched value of one argument.
 *
 * `fromArgv` is false when the values were filled in from the argument's
 * defaults, or when a flag kept its resting value.
 */
export type MatchedArg =
  | { readonly kind: 'single' | 'multiple'; readonly values: readonly string[]; readonly fromArgv: boolean }
  | { readonly kind: 'flag'; readonly enabled: boolean; readonly fromArgv: boolean }
  | { readonly kind: 'counter'; readonly count: number };

/**
 * Plain-data form of {@link ArgMatches}, as returned by `toJSON()`.
 *
 * Absent single values are `null`.
 */
export interface ArgMatchesJSON {
  readonly command: string;
  readonly args: Record<string, string | readonly string[] | boolean | number | null>;
  readonly subcommand: ArgMatchesJSON | null;
}
