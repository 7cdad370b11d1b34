/**
 * Argument vector matcher.
 *
 * Parses an argument vector against a {@link CommandSpec}. The orchestrator
 * uses it to verify an assembled vector before spawning, and a re-entered
 * child uses it to read its own arguments.
 *
 * Accepted syntax: `--long value`, `--long=value`, `-s value`, `-s=value`,
 * bare positional values in declaration order, sub-command names, and `--` to
 * end option parsing. Short flags cannot be clustered.
 *
 * @packageDocumentation
 */

import type { ArgSpec, CommandSpec } from '../schema/types.js';
import { ArgMatches, type SubcommandMatches } from './arg-matches.js';
import type { MatchError, MatchResult, MatchedArg } from './types.js';

/**
 * Error thrown when a vector that was expected to match does not.
 */
export class ArgMatchError extends Error {
  /** The underlying match failure. */
  public readonly error: MatchError;

  /**
   * Creates a new ArgMatchError.
   *
   * @param error - The match failure.
   */
  constructor(error: MatchError) {
    super(describeMatchError(error));
    this.name = 'ArgMatchError';
    this.error = error;
  }
}

/**
 * Renders a match failure as an English sentence for logs and exceptions.
 *
 * Presentation layers should use the localized messages instead.
 */
export function describeMatchError(error: MatchError): string {
  const where = error.path.length > 0 ? ` (in '${error.path.join(' ')}')` : '';
  switch (error.kind) {
    case 'unknown-argument':
      return `Unknown argument '${error.token}'${where}`;
    case 'missing-value':
      return `Argument '${error.argId}' needs a value${where}`;
    case 'equals-required':
      return `Argument '${error.argId}' must be given as token=value${where}`;
    case 'unexpected-value':
      return `Argument '${error.argId}' does not take a value${where}`;
    case 'invalid-value':
      return `Invalid value '${error.value}' for argument '${error.argId}', expected one of: ${error.allowed.join(', ')}${where}`;
    case 'missing-required':
      return `Missing required argument '${error.argId}'${where}`;
    case 'missing-subcommand':
      return `A sub-command is required${where}`;
    case 'unexpected-positional':
      return `Unexpected value '${error.token}'${where}`;
  }
}

type Accumulator =
  | { readonly kind: 'single' | 'multiple'; values: string[] }
  | { readonly kind: 'flag'; readonly valueWhenPresent: boolean; enabled: boolean; present: boolean }
  | { readonly kind: 'counter'; count: number };

function emptyAccumulator(spec: ArgSpec): Accumulator {
  switch (spec.cardinality) {
    case 'single':
    case 'multiple':
      return { kind: spec.cardinality, values: [] };
    case 'flag':
      return { kind: 'flag', valueWhenPresent: spec.valueWhenPresent, enabled: !spec.valueWhenPresent, present: false };
    case 'counter':
      return { kind: 'counter', count: 0 };
  }
}

function isOptionToken(token: string): boolean {
  return token.startsWith('-') && token !== '-';
}

function findBySpelling(spec: CommandSpec, spelling: string): ArgSpec | undefined {
  return spec.args.find((arg) => arg.spellings.includes(spelling));
}

interface NodeScan {
  readonly accumulators: Map<string, Accumulator>;
  /** Index of the sub-command name token, if one was found. */
  readonly subcommandIndex: number | undefined;
}

type ScanResult =
  | { readonly success: true; readonly scan: NodeScan }
  | { readonly success: false; readonly error: MatchError };

/**
 * Consumes the tokens belonging to one command, stopping at a sub-command name.
 */
function scanNode(spec: CommandSpec, argv: readonly string[], start: number, path: readonly string[]): ScanResult {
  const accumulators = new Map<string, Accumulator>();
  for (const arg of spec.args) {
    accumulators.set(arg.id, emptyAccumulator(arg));
  }
  const positionals = spec.args.filter(
    (arg) => (arg.cardinality === 'single' || arg.cardinality === 'multiple') && arg.invocationToken === undefined
  );
  let positionalIndex = 0;
  let optionsEnded = false;

  for (let i = start; i < argv.length; i++) {
    const token = argv[i] ?? '';

    if (!optionsEnded && token === '--') {
      optionsEnded = true;
      continue;
    }

    if (!optionsEnded && isOptionToken(token)) {
      const equalsAt = token.indexOf('=');
      const spelling = equalsAt >= 0 ? token.slice(0, equalsAt) : token;
      const inline = equalsAt >= 0 ? token.slice(equalsAt + 1) : undefined;
      const arg = findBySpelling(spec, spelling);
      const accumulator = arg === undefined ? undefined : accumulators.get(arg.id);
      if (arg === undefined || accumulator === undefined) {
        return { success: false, error: { kind: 'unknown-argument', token, path } };
      }

      if (accumulator.kind === 'flag' || accumulator.kind === 'counter') {
        if (inline !== undefined) {
          return { success: false, error: { kind: 'unexpected-value', argId: arg.id, path } };
        }
        if (accumulator.kind === 'flag') {
          accumulator.enabled = accumulator.valueWhenPresent;
          accumulator.present = true;
        } else {
          accumulator.count += 1;
        }
        continue;
      }

      let value = inline;
      if (value === undefined) {
        if (arg.useEquals) {
          return { success: false, error: { kind: 'equals-required', argId: arg.id, path } };
        }
        const next = argv[i + 1];
        if (next === undefined) {
          return { success: false, error: { kind: 'missing-value', argId: arg.id, path } };
        }
        value = next;
        i += 1;
      }

      if (accumulator.kind === 'single') {
        // Last occurrence wins.
        accumulator.values = [value];
      } else {
        accumulator.values.push(value);
      }
      continue;
    }

    if (!optionsEnded && spec.subcommands.some((sub) => sub.name === token)) {
      return { success: true, scan: { accumulators, subcommandIndex: i } };
    }

    const positional = positionals[positionalIndex];
    const accumulator = positional === undefined ? undefined : accumulators.get(positional.id);
    if (accumulator === undefined || (accumulator.kind !== 'single' && accumulator.kind !== 'multiple')) {
      return { success: false, error: { kind: 'unexpected-positional', token, path } };
    }
    accumulator.values.push(token);
    if (accumulator.kind === 'single') {
      positionalIndex += 1;
    }
  }

  return { success: true, scan: { accumulators, subcommandIndex: undefined } };
}

/**
 * Checks allowed values and required arguments, then fills in defaults.
 */
function finishNode(
  spec: CommandSpec,
  accumulators: ReadonlyMap<string, Accumulator>,
  path: readonly string[]
): { success: true; values: Map<string, MatchedArg> } | { success: false; error: MatchError } {
  for (const arg of spec.args) {
    const accumulator = accumulators.get(arg.id);
    if (accumulator === undefined || (accumulator.kind !== 'single' && accumulator.kind !== 'multiple')) {
      continue;
    }
    if (arg.allowedValues.length === 0) {
      continue;
    }
    const invalid = accumulator.values.find((value) => !arg.allowedValues.includes(value));
    if (invalid !== undefined) {
      return {
        success: false,
        error: { kind: 'invalid-value', argId: arg.id, value: invalid, allowed: arg.allowedValues, path },
      };
    }
  }

  for (const arg of spec.args) {
    const accumulator = accumulators.get(arg.id);
    if (arg.cardinality === 'single' && arg.required && accumulator?.kind === 'single' && accumulator.values.length === 0) {
      return { success: false, error: { kind: 'missing-required', argId: arg.id, path } };
    }
  }

  const values = new Map<string, MatchedArg>();
  for (const arg of spec.args) {
    const accumulator = accumulators.get(arg.id) ?? emptyAccumulator(arg);
    switch (accumulator.kind) {
      case 'single':
      case 'multiple':
        if (accumulator.values.length === 0 && arg.defaultValues.length > 0) {
          const defaults = accumulator.kind === 'single' ? arg.defaultValues.slice(0, 1) : [...arg.defaultValues];
          values.set(arg.id, { kind: accumulator.kind, values: defaults, fromArgv: false });
        } else {
          values.set(arg.id, {
            kind: accumulator.kind,
            values: [...accumulator.values],
            fromArgv: accumulator.values.length > 0,
          });
        }
        break;
      case 'flag':
        values.set(arg.id, { kind: 'flag', enabled: accumulator.enabled, fromArgv: accumulator.present });
        break;
      case 'counter':
        values.set(arg.id, { kind: 'counter', count: accumulator.count });
        break;
    }
  }
  return { success: true, values };
}

function matchNode(spec: CommandSpec, argv: readonly string[], start: number, path: readonly string[]): MatchResult {
  const scanned = scanNode(spec, argv, start, path);
  if (!scanned.success) {
    return scanned;
  }

  const finished = finishNode(spec, scanned.scan.accumulators, path);
  if (!finished.success) {
    return finished;
  }

  const index = scanned.scan.subcommandIndex;
  let subcommand: SubcommandMatches | undefined;
  if (index === undefined) {
    if (spec.subcommandRequired) {
      return { success: false, error: { kind: 'missing-subcommand', path } };
    }
  } else {
    const name = argv[index] ?? '';
    const child = spec.subcommands.find((sub) => sub.name === name);
    if (child === undefined) {
      return { success: false, error: { kind: 'unexpected-positional', token: name, path } };
    }
    const matched = matchNode(child, argv, index + 1, [...path, name]);
    if (!matched.success) {
      return matched;
    }
    subcommand = { name, matches: matched.matches };
  }

  return { success: true, matches: new ArgMatches(spec.name, finished.values, subcommand) };
}

/**
 * Matches an argument vector against a command spec.
 *
 * @param spec - The root command spec.
 * @param argv - The vector without the program name.
 * @returns The matches, or the first failure found.
 *
 * @example
 * ```typescript
 * const result = matchArgs(spec, ['--mode', 'fast', 'input.txt']);
 * if (result.success) {
 *   result.matches.getString('mode'); // "fast"
 * }
 * ```
 */
export function matchArgs(spec: CommandSpec, argv: readonly string[]): MatchResult {
  return matchNode(spec, argv, 0, []);
}
