/**
 * Read access to the outcome of a successful match.
 *
 * @packageDocumentation
 */

import { ArgumentKindError, ArgumentNotFoundError } from '../state/command-state.js';
import type { ArgMatchesJSON, MatchedArg } from './types.js';

/**
 * The selected sub-command of a match.
 */
export interface SubcommandMatches {
  readonly name: string;
  readonly matches: ArgMatches;
}

/**
 * Matched values of one command, keyed by argument id.
 *
 * Accessors throw {@link ArgumentNotFoundError} for ids the command does not
 * declare and {@link ArgumentKindError} when the accessor does not fit the
 * argument.
 */
export class ArgMatches {
  /** Name of the matched command. */
  readonly command: string;
  /** The matched sub-command, if one was on the vector. */
  readonly subcommand: SubcommandMatches | undefined;
  private readonly values: ReadonlyMap<string, MatchedArg>;

  constructor(
    command: string,
    values: ReadonlyMap<string, MatchedArg>,
    subcommand: SubcommandMatches | undefined
  ) {
    this.command = command;
    this.values = values;
    this.subcommand = subcommand;
  }

  /**
   * Value of a single-value argument, or undefined when absent without a default.
   */
  getString(id: string): string | undefined {
    const matched = this.lookup(id);
    if (matched.kind !== 'single') {
      throw new ArgumentKindError(id, 'single', matched.kind);
    }
    return matched.values[0];
  }

  /**
   * Every value of a single- or multiple-value argument, in vector order.
   */
  getStrings(id: string): readonly string[] {
    const matched = this.lookup(id);
    if (matched.kind !== 'single' && matched.kind !== 'multiple') {
      throw new ArgumentKindError(id, 'multiple', matched.kind);
    }
    return matched.values;
  }

  getFlag(id: string): boolean {
    const matched = this.lookup(id);
    if (matched.kind !== 'flag') {
      throw new ArgumentKindError(id, 'flag', matched.kind);
    }
    return matched.enabled;
  }

  getCount(id: string): number {
    const matched = this.lookup(id);
    if (matched.kind !== 'counter') {
      throw new ArgumentKindError(id, 'counter', matched.kind);
    }
    return matched.count;
  }

  /**
   * Whether the argument appeared on the vector. Defaults do not count.
   */
  isPresent(id: string): boolean {
    const matched = this.lookup(id);
    switch (matched.kind) {
      case 'single':
      case 'multiple':
        return matched.fromArgv;
      case 'flag':
        return matched.fromArgv;
      case 'counter':
        return matched.count > 0;
    }
  }

  toJSON(): ArgMatchesJSON {
    const args: Record<string, string | readonly string[] | boolean | number | null> = {};
    for (const [id, matched] of this.values) {
      switch (matched.kind) {
        case 'single':
          args[id] = matched.values[0] ?? null;
          break;
        case 'multiple':
          args[id] = [...matched.values];
          break;
        case 'flag':
          args[id] = matched.enabled;
          break;
        case 'counter':
          args[id] = matched.count;
          break;
      }
    }
    return {
      command: this.command,
      args,
      subcommand: this.subcommand === undefined ? null : this.subcommand.matches.toJSON(),
    };
  }

  private lookup(id: string): MatchedArg {
    const matched = this.values.get(id);
    if (matched === undefined) {
      throw new ArgumentNotFoundError(id, this.command);
    }
    return matched;
  }
}
