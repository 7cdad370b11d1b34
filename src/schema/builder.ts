/**
 * Construction of the immutable argument spec model from a command definition.
 *
 * @packageDocumentation
 */

import { toSentenceCase } from './display-name.js';
import { isArgAction } from './types.js';
import type {
  ArgDefinition,
  ArgSpec,
  CommandDefinition,
  CommandSpec,
  PathHint,
  ValueHint,
} from './types.js';

/**
 * Error thrown when a command definition cannot be turned into a spec.
 *
 * These are defects in the host's definition, not user errors.
 */
export class SchemaError extends Error {
  /** Sub-command names from the root to the offending command. */
  public readonly path: readonly string[];
  /** Offending argument id, when the defect is tied to one argument. */
  public readonly argId: string | undefined;

  /**
   * Creates a new SchemaError.
   *
   * @param message - Description of the defect.
   * @param path - Sub-command names leading to the offending command.
   * @param argId - Offending argument id, if any.
   */
  constructor(message: string, path: readonly string[], argId?: string) {
    const location = path.length > 0 ? ` (in '${path.join(' ')}')` : '';
    super(`${message}${location}`);
    this.name = 'SchemaError';
    this.path = path;
    this.argId = argId;
  }
}

function toPathHint(hint: ValueHint | undefined): PathHint {
  switch (hint) {
    case undefined:
    case 'none':
      return 'none';
    case 'file':
      return 'file';
    case 'directory':
      return 'directory';
    case 'any-path':
      return 'either';
  }
}

/**
 * Collects every spelling of an argument, long form first.
 */
function spellingsOf(definition: ArgDefinition, path: readonly string[]): string[] {
  const spellings: string[] = [];

  if (definition.long !== undefined) {
    if (definition.long === '' || definition.long.startsWith('-')) {
      throw new SchemaError(
        `Invalid long spelling '${definition.long}' for argument '${definition.id}'`,
        path,
        definition.id
      );
    }
    spellings.push(`--${definition.long}`);
  }

  if (definition.short !== undefined) {
    if (Array.from(definition.short).length !== 1 || definition.short === '-') {
      throw new SchemaError(
        `Short spelling for argument '${definition.id}' must be a single character, got '${definition.short}'`,
        path,
        definition.id
      );
    }
    spellings.push(`-${definition.short}`);
  }

  return spellings;
}

/**
 * Builds the spec for one argument.
 *
 * @param definition - The argument definition.
 * @param path - Sub-command names leading to the owning command, for error messages.
 * @returns The argument spec.
 * @throws SchemaError if the action is unknown, or a flag or counter has no spelling.
 */
export function buildArgSpec(definition: ArgDefinition, path: readonly string[] = []): ArgSpec {
  if (definition.id === '') {
    throw new SchemaError('Argument id must not be empty', path);
  }

  const spellings = spellingsOf(definition, path);
  const action: string = definition.action ?? 'set';
  if (!isArgAction(action)) {
    throw new SchemaError(`Argument '${definition.id}' has unknown action '${action}'`, path, definition.id);
  }

  const base = {
    id: definition.id,
    displayName: toSentenceCase(definition.id),
    spellings,
    helpText: definition.longHelp ?? definition.help,
    required: definition.required ?? false,
    useEquals: definition.requireEquals ?? false,
    defaultValues: [...(definition.defaultValues ?? [])],
    allowedValues: [...(definition.possibleValues ?? [])],
    pathHint: toPathHint(definition.valueHint),
  };
  const token = spellings[0];

  switch (action) {
    case 'set':
      return { ...base, cardinality: 'single', invocationToken: token };
    case 'append':
      return { ...base, cardinality: 'multiple', invocationToken: token };
    case 'set-true':
    case 'set-false':
    case 'count': {
      if (token === undefined) {
        throw new SchemaError(
          `Argument '${definition.id}' with action '${action}' needs a long or short spelling`,
          path,
          definition.id
        );
      }
      return action === 'count'
        ? { ...base, cardinality: 'counter', invocationToken: token }
        : { ...base, cardinality: 'flag', invocationToken: token, valueWhenPresent: action === 'set-true' };
    }
  }
}

function buildAt(definition: CommandDefinition, path: readonly string[]): CommandSpec {
  if (definition.name === '') {
    throw new SchemaError('Command name must not be empty', path);
  }

  const ids = new Set<string>();
  const spellings = new Set<string>();
  const args = (definition.args ?? []).map((argDefinition) => {
    const spec = buildArgSpec(argDefinition, path);
    if (ids.has(spec.id)) {
      throw new SchemaError(`Duplicate argument id '${spec.id}'`, path, spec.id);
    }
    ids.add(spec.id);
    for (const spelling of spec.spellings) {
      if (spellings.has(spelling)) {
        throw new SchemaError(`Duplicate spelling '${spelling}'`, path, spec.id);
      }
      spellings.add(spelling);
    }
    return spec;
  });

  const names = new Set<string>();
  const subcommands = (definition.subcommands ?? []).map((child) => {
    if (names.has(child.name)) {
      throw new SchemaError(`Duplicate sub-command '${child.name}'`, path);
    }
    names.add(child.name);
    return buildAt(child, [...path, child.name]);
  });

  return {
    name: definition.name,
    displayName: toSentenceCase(definition.name),
    about: definition.about,
    args,
    subcommands,
    subcommandRequired: (definition.subcommandRequired ?? false) && subcommands.length > 0,
  };
}

/**
 * Builds the immutable spec tree for a command definition.
 *
 * @param definition - The root command definition.
 * @returns The command spec, with one nested spec per sub-command alternative.
 * @throws SchemaError if the definition is malformed.
 *
 * @example
 * ```typescript
 * const spec = buildCommandSpec({
 *   name: 'greet',
 *   args: [
 *     { id: 'name', required: true },
 *     { id: 'loud', long: 'loud', action: 'set-true' },
 *   ],
 * });
 * spec.args[1]?.invocationToken; // "--loud"
 * ```
 */
export function buildCommandSpec(definition: CommandDefinition): CommandSpec {
  return buildAt(definition, []);
}

/**
 * Finds a direct sub-command spec by name.
 *
 * @param spec - The parent command spec.
 * @param name - The sub-command name.
 * @returns The sub-command spec, or undefined if there is none.
 */
export function findSubcommand(spec: CommandSpec, name: string): CommandSpec | undefined {
  return spec.subcommands.find((child) => child.name === name);
}
