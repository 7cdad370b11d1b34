/**
 * Mutable argument state and the Command State Tree.
 *
 * @packageDocumentation
 */

export { createArgState, createValueEntry, isArgStateEmpty } from './arg-state.js';
export {
  ArgumentKindError,
  ArgumentNotFoundError,
  CommandState,
  CommandStateTree,
  SubcommandNotFoundError,
  createCommandStateTree,
} from './command-state.js';
export type { CommandStateTreeOptions, SubcommandChoice } from './command-state.js';
export type {
  ArgState,
  ArgStateKind,
  CounterArgState,
  FlagArgState,
  MultipleArgState,
  SingleArgState,
  ValueEntry,
} from './types.js';
