/**
 * Argument Vector Assembler.
 *
 * Turns the current Command State Tree into the ordered token list handed to
 * the child process supervisor. Assembly is pure: the same tree always yields
 * the same tokens, and the tree is never modified.
 *
 * @packageDocumentation
 */

import { CommandStateTree, type CommandState } from '../state/command-state.js';
import { isArgStateEmpty } from '../state/arg-state.js';
import type { ArgState } from '../state/types.js';

/**
 * Why assembly failed.
 */
export type AssemblyError =
  | {
      readonly kind: 'missing-required';
      /** Id of the empty required argument. */
      readonly argId: string;
      /** Sub-command names from the root to the owning node. */
      readonly path: readonly string[];
    }
  | {
      readonly kind: 'missing-subcommand';
      /** Sub-command names from the root to the node lacking a choice. */
      readonly path: readonly string[];
    };

/**
 * Result of assembling an argument vector.
 */
export type AssemblyResult =
  | { readonly success: true; readonly argv: string[] }
  | { readonly success: false; readonly error: AssemblyError };

function withToken(token: string | undefined, value: string, useEquals: boolean): string[] {
  if (token === undefined) {
    return [value];
  }
  return useEquals ? [`${token}=${value}`] : [token, value];
}

/**
 * Emits the tokens of one argument.
 *
 * @returns The tokens, or undefined when a required value is missing.
 */
function argTokens(state: ArgState): string[] | undefined {
  switch (state.kind) {
    case 'single':
      if (isArgStateEmpty(state)) {
        return state.spec.required ? undefined : [];
      }
      return withToken(state.spec.invocationToken, state.entry.text, state.spec.useEquals);
    case 'multiple':
      return state.entries.flatMap((entry) =>
        withToken(state.spec.invocationToken, entry.text, state.spec.useEquals)
      );
    case 'flag':
      return isArgStateEmpty(state) ? [] : [state.spec.invocationToken];
    case 'counter':
      return Array.from({ length: state.count }, () => state.spec.invocationToken);
  }
}

function assembleNode(node: CommandState, path: string[], argv: string[]): AssemblyError | undefined {
  argv.push(node.spec.name);

  for (const state of node.args.values()) {
    const tokens = argTokens(state);
    if (tokens === undefined) {
      return { kind: 'missing-required', argId: state.spec.id, path: [...path] };
    }
    argv.push(...tokens);
  }

  const choice = node.subcommand;
  if (choice === undefined) {
    return node.spec.subcommandRequired ? { kind: 'missing-subcommand', path: [...path] } : undefined;
  }

  path.push(choice.name);
  return assembleNode(choice.node, path, argv);
}

/**
 * Assembles the argument vector for a tree or a single node.
 *
 * Each node contributes its own name first (so the root's name is the program,
 * `argv[0]`), then its arguments in declaration order, then the tokens of its
 * selected sub-command.
 *
 * @param source - The tree, or a node to assemble from.
 * @returns The tokens, or the first validation failure in declaration order.
 *
 * @example
 * ```typescript
 * const result = assembleArgs(tree);
 * if (result.success) {
 *   console.log(result.argv); // ["tool", "--mode", "fast", "input.txt"]
 * }
 * ```
 */
export function assembleArgs(source: CommandStateTree | CommandState): AssemblyResult {
  const node = source instanceof CommandStateTree ? source.root : source;
  const argv: string[] = [];
  const error = assembleNode(node, [], argv);

  if (error !== undefined) {
    return { success: false, error };
  }
  return { success: true, argv };
}
