/**
 * Command State Tree: the mutable runtime model of a command line.
 *
 * A {@link CommandState} node owns one state per argument of its command and,
 * when the command has sub-commands, the currently selected child node. The
 * {@link CommandStateTree} owns the root node and addresses nodes by the path of
 * selected sub-command names.
 *
 * @packageDocumentation
 */

import { findSubcommand } from '../schema/builder.js';
import type { ArgSpec, CommandSpec } from '../schema/types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { createArgState, createValueEntry } from './arg-state.js';
import type {
  ArgState,
  ArgStateKind,
  CounterArgState,
  FlagArgState,
  MultipleArgState,
  SingleArgState,
} from './types.js';

/**
 * Error thrown when a mutation names an argument the node does not own.
 */
export class ArgumentNotFoundError extends Error {
  /** The unknown argument id. */
  public readonly argId: string;
  /** The command owning the node the mutation was applied to. */
  public readonly command: string;

  /**
   * Creates a new ArgumentNotFoundError.
   *
   * @param argId - The unknown argument id.
   * @param command - Name of the command.
   */
  constructor(argId: string, command: string) {
    super(`Command '${command}' has no argument '${argId}'`);
    this.name = 'ArgumentNotFoundError';
    this.argId = argId;
    this.command = command;
  }
}

/**
 * Error thrown when a mutation does not fit the argument's kind, such as
 * toggling a counter.
 */
export class ArgumentKindError extends Error {
  /** The argument id. */
  public readonly argId: string;
  /** The kind the mutation expected. */
  public readonly expected: ArgStateKind;
  /** The argument's actual kind. */
  public readonly actual: ArgStateKind;

  /**
   * Creates a new ArgumentKindError.
   *
   * @param argId - The argument id.
   * @param expected - Kind the mutation works on.
   * @param actual - Kind of the argument.
   */
  constructor(argId: string, expected: ArgStateKind, actual: ArgStateKind) {
    super(`Argument '${argId}' is a ${actual} argument, expected ${expected}`);
    this.name = 'ArgumentKindError';
    this.argId = argId;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when a sub-command name or tree path does not exist.
 */
export class SubcommandNotFoundError extends Error {
  /** The path that was requested. */
  public readonly path: readonly string[];

  /**
   * Creates a new SubcommandNotFoundError.
   *
   * @param path - The path (or parent path plus name) that could not be resolved.
   * @param reason - Why it could not be resolved.
   */
  constructor(path: readonly string[], reason: string) {
    super(`Cannot resolve sub-command path '${path.join(' ')}': ${reason}`);
    this.name = 'SubcommandNotFoundError';
    this.path = path;
  }
}

/**
 * The selected sub-command of a node.
 */
export interface SubcommandChoice {
  readonly name: string;
  readonly node: CommandState;
}

/**
 * Runtime state for one command.
 *
 * Mutations are synchronous and touch only this node. Every value mutation
 * clears the argument's validation error.
 */
export class CommandState {
  /** The command this node mirrors. */
  readonly spec: CommandSpec;
  private readonly states: Map<string, ArgState>;
  private choice: SubcommandChoice | undefined;

  /**
   * Creates a node with every argument at its empty representation and no
   * sub-command selected.
   *
   * @param spec - The command spec.
   */
  constructor(spec: CommandSpec) {
    this.spec = spec;
    this.states = new Map(spec.args.map((arg): [string, ArgState] => [arg.id, createArgState(arg)]));
    this.choice = undefined;
  }

  /**
   * Argument states in declaration order.
   */
  get args(): ReadonlyMap<string, ArgState> {
    return this.states;
  }

  /**
   * The selected sub-command, if any.
   */
  get subcommand(): SubcommandChoice | undefined {
    return this.choice;
  }

  /**
   * Looks up an argument state.
   *
   * @param id - Argument id.
   * @returns The state.
   * @throws ArgumentNotFoundError if the node has no such argument.
   */
  arg(id: string): ArgState {
    const state = this.states.get(id);
    if (state === undefined) {
      throw new ArgumentNotFoundError(id, this.spec.name);
    }
    return state;
  }

  /**
   * Whether the node owns an argument.
   *
   * @param id - Argument id.
   */
  hasArg(id: string): boolean {
    return this.states.has(id);
  }

  /**
   * Sets the value of a single-value argument.
   *
   * @param id - Argument id.
   * @param text - New value.
   */
  setSingle(id: string, text: string): void {
    const state = this.single(id);
    state.entry.text = text;
    state.validationError = undefined;
  }

  /**
   * Restores a single-value argument to its first default value, or to empty.
   *
   * @param id - Argument id.
   */
  resetSingleToDefault(id: string): void {
    const state = this.single(id);
    state.entry = createValueEntry(state.spec.defaultValues[0] ?? '');
    state.validationError = undefined;
  }

  /**
   * Appends a value to a multi-value argument.
   *
   * @param id - Argument id.
   * @param text - Value to append; an empty row by default.
   */
  addMultiple(id: string, text = ''): void {
    const state = this.multiple(id);
    state.entries.push(createValueEntry(text));
    state.validationError = undefined;
  }

  /**
   * Replaces one value of a multi-value argument, keeping its identity.
   *
   * @param id - Argument id.
   * @param index - Position of the value.
   * @param text - New value.
   * @throws RangeError if the index is out of range.
   */
  setMultiple(id: string, index: number, text: string): void {
    const state = this.multiple(id);
    const entry = state.entries[index];
    if (entry === undefined) {
      throw new RangeError(
        `Index ${String(index)} out of range for argument '${id}' with ${String(state.entries.length)} values`
      );
    }
    entry.text = text;
    state.validationError = undefined;
  }

  /**
   * Removes one value of a multi-value argument.
   *
   * @param id - Argument id.
   * @param index - Position of the value.
   * @throws RangeError if the index is out of range.
   */
  removeMultiple(id: string, index: number): void {
    const state = this.multiple(id);
    if (!Number.isInteger(index) || index < 0 || index >= state.entries.length) {
      throw new RangeError(
        `Index ${String(index)} out of range for argument '${id}' with ${String(state.entries.length)} values`
      );
    }
    state.entries.splice(index, 1);
    state.validationError = undefined;
  }

  /**
   * Replaces the values of a multi-value argument with its defaults (possibly
   * none), each with a fresh identity.
   *
   * @param id - Argument id.
   */
  resetMultipleToDefault(id: string): void {
    const state = this.multiple(id);
    state.entries = state.spec.defaultValues.map((text) => createValueEntry(text));
    state.validationError = undefined;
  }

  /**
   * Flips a flag.
   *
   * @param id - Argument id.
   */
  toggleFlag(id: string): void {
    const state = this.flag(id);
    state.enabled = !state.enabled;
    state.validationError = undefined;
  }

  /**
   * Sets a flag.
   *
   * @param id - Argument id.
   * @param enabled - New value.
   */
  setFlag(id: string, enabled: boolean): void {
    const state = this.flag(id);
    state.enabled = enabled;
    state.validationError = undefined;
  }

  /**
   * Adds one occurrence to a counter.
   *
   * @param id - Argument id.
   */
  incrementCounter(id: string): void {
    const state = this.counter(id);
    state.count += 1;
    state.validationError = undefined;
  }

  /**
   * Removes one occurrence from a counter. No-op at zero.
   *
   * @param id - Argument id.
   */
  decrementCounter(id: string): void {
    const state = this.counter(id);
    if (state.count === 0) {
      return;
    }
    state.count -= 1;
    state.validationError = undefined;
  }

  /**
   * Selects a sub-command, replacing any previous choice with a fresh node.
   *
   * Edits made in a previously selected branch are discarded, also when the
   * same sub-command is selected again.
   *
   * @param name - Sub-command name, or undefined to clear the choice.
   * @returns The new child node, or undefined when the choice was cleared.
   * @throws SubcommandNotFoundError if the command has no such sub-command.
   */
  selectSubcommand(name: string | undefined): CommandState | undefined {
    if (name === undefined) {
      this.choice = undefined;
      return undefined;
    }

    const childSpec = findSubcommand(this.spec, name);
    if (childSpec === undefined) {
      throw new SubcommandNotFoundError(
        [this.spec.name, name],
        `'${this.spec.name}' has no sub-command '${name}'`
      );
    }

    const node = new CommandState(childSpec);
    this.choice = { name, node };
    return node;
  }

  /**
   * Writes a validation error onto the argument with the given id.
   *
   * @param id - Argument id.
   * @param message - Message to show.
   * @returns False, with nothing changed, if the node has no such argument.
   */
  applyValidationError(id: string, message: string): boolean {
    const state = this.states.get(id);
    if (state === undefined) {
      return false;
    }
    state.validationError = message;
    return true;
  }

  /**
   * Clears every validation error in this node and its selected descendants.
   */
  clearValidationErrors(): void {
    for (const state of this.states.values()) {
      state.validationError = undefined;
    }
    this.choice?.node.clearValidationErrors();
  }

  private single(id: string): SingleArgState {
    const state = this.arg(id);
    if (state.kind !== 'single') {
      throw new ArgumentKindError(id, 'single', state.kind);
    }
    return state;
  }

  private multiple(id: string): MultipleArgState {
    const state = this.arg(id);
    if (state.kind !== 'multiple') {
      throw new ArgumentKindError(id, 'multiple', state.kind);
    }
    return state;
  }

  private flag(id: string): FlagArgState {
    const state = this.arg(id);
    if (state.kind !== 'flag') {
      throw new ArgumentKindError(id, 'flag', state.kind);
    }
    return state;
  }

  private counter(id: string): CounterArgState {
    const state = this.arg(id);
    if (state.kind !== 'counter') {
      throw new ArgumentKindError(id, 'counter', state.kind);
    }
    return state;
  }
}

/**
 * Options for creating a CommandStateTree.
 */
export interface CommandStateTreeOptions {
  /** Logger for dropped validation errors. */
  readonly logger?: Logger;
}

/**
 * The whole runtime model: built once from a spec, mutated in place, never rebuilt.
 *
 * @example
 * ```typescript
 * const tree = createCommandStateTree(buildCommandSpec(definition));
 * tree.root.setSingle('required_field', 'value');
 * tree.selectSubcommand([], 'subcommand-a');
 * tree.nodeAt(['subcommand-a']).setSingle('choose_one', 'Two');
 * ```
 */
export class CommandStateTree {
  readonly root: CommandState;
  private readonly logger: Logger;

  /**
   * Creates a tree for a spec.
   *
   * @param spec - Root command spec.
   * @param options - Tree options.
   */
  constructor(spec: CommandSpec, options: CommandStateTreeOptions = {}) {
    this.root = new CommandState(spec);
    this.logger = options.logger ?? createLogger('CommandStateTree');
  }

  /**
   * The root command spec.
   */
  get spec(): CommandSpec {
    return this.root.spec;
  }

  /**
   * Resolves a node along the currently selected branch.
   *
   * @param path - Sub-command names from the root; empty for the root itself.
   * @returns The node.
   * @throws SubcommandNotFoundError if the path leaves the selected branch.
   */
  nodeAt(path: readonly string[]): CommandState {
    let node = this.root;
    for (const [depth, name] of path.entries()) {
      const choice = node.subcommand;
      if (choice === undefined || choice.name !== name) {
        const selected = choice === undefined ? 'nothing is selected' : `'${choice.name}' is selected`;
        throw new SubcommandNotFoundError(
          path.slice(0, depth + 1),
          `'${name}' is not the selected sub-command of '${node.spec.name}' (${selected})`
        );
      }
      node = choice.node;
    }
    return node;
  }

  /**
   * Names of the selected sub-commands from the root downwards.
   */
  activePath(): string[] {
    const path: string[] = [];
    let choice = this.root.subcommand;
    while (choice !== undefined) {
      path.push(choice.name);
      choice = choice.node.subcommand;
    }
    return path;
  }

  /**
   * Selects a sub-command of the node at `path`.
   *
   * @param path - Path of the parent node.
   * @param name - Sub-command name, or undefined to clear the choice.
   * @returns The new child node, if any.
   */
  selectSubcommand(path: readonly string[], name: string | undefined): CommandState | undefined {
    return this.nodeAt(path).selectSubcommand(name);
  }

  /**
   * Paints a validation error onto the first node of the selected branch, from
   * `path` downwards, that owns the argument. Other arguments are untouched.
   *
   * When nothing owns the id the error is dropped: that is a caller bug, not
   * something to show the user.
   *
   * @param id - Argument id.
   * @param message - Message to show.
   * @param path - Node to start searching at; the root by default.
   * @returns Whether an argument was painted.
   */
  applyValidationError(id: string, message: string, path: readonly string[] = []): boolean {
    let node: CommandState | undefined = this.nodeAt(path);
    while (node !== undefined) {
      if (node.applyValidationError(id, message)) {
        return true;
      }
      node = node.subcommand?.node;
    }

    this.logger.debug('validation_error_dropped', { argId: id, path: [...path] });
    return false;
  }

  /**
   * Clears every validation error on the selected branch.
   */
  clearValidationErrors(): void {
    this.root.clearValidationErrors();
  }

  /**
   * Collects every argument with a validation error along the selected branch.
   *
   * @returns Path, spec and message of each painted argument.
   */
  validationErrors(): { path: string[]; spec: ArgSpec; message: string }[] {
    const errors: { path: string[]; spec: ArgSpec; message: string }[] = [];
    const path: string[] = [];
    let node: CommandState | undefined = this.root;
    while (node !== undefined) {
      for (const state of node.args.values()) {
        if (state.validationError !== undefined) {
          errors.push({ path: [...path], spec: state.spec, message: state.validationError });
        }
      }
      const choice: SubcommandChoice | undefined = node.subcommand;
      if (choice !== undefined) {
        path.push(choice.name);
      }
      node = choice?.node;
    }
    return errors;
  }
}

/**
 * Creates the runtime model for a spec.
 *
 * @param spec - Root command spec.
 * @param options - Tree options.
 * @returns The tree.
 */
export function createCommandStateTree(
  spec: CommandSpec,
  options: CommandStateTreeOptions = {}
): CommandStateTree {
  return new CommandStateTree(spec, options);
}
