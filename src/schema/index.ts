/**
 * Argument spec model: command definitions in, immutable spec trees out.
 *
 * @packageDocumentation
 */

export { SchemaError, buildArgSpec, buildCommandSpec, findSubcommand } from './builder.js';
export { toSentenceCase } from './display-name.js';
export { ARG_ACTIONS, isArgAction } from './types.js';
export type {
  ArgAction,
  ArgDefinition,
  ArgSpec,
  Cardinality,
  CommandDefinition,
  CommandSpec,
  CounterArgSpec,
  FlagArgSpec,
  MultipleArgSpec,
  PathHint,
  SingleArgSpec,
  ValueHint,
} from './types.js';
