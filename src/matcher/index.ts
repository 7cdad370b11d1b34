/**
 * Argument vector matcher.
 *
 * @packageDocumentation
 */

export { ArgMatches } from './arg-matches.js';
export type { SubcommandMatches } from './arg-matches.js';
export { ArgMatchError, describeMatchError, matchArgs } from './matcher.js';
export type { ArgMatchesJSON, MatchError, MatchErrorKind, MatchResult, MatchedArg } from './types.js';
