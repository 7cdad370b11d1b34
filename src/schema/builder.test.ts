import { describe, expect, it } from 'vitest';
import { showcaseDefinition } from '../../test-fixtures/showcase.js';
import { SchemaError, buildArgSpec, buildCommandSpec, findSubcommand } from './builder.js';
import { isArgAction, type ArgDefinition } from './types.js';

describe('buildArgSpec', () => {
  it('maps each action to its cardinality', () => {
    expect(buildArgSpec({ id: 'a', long: 'a' }).cardinality).toBe('single');
    expect(buildArgSpec({ id: 'a', long: 'a', action: 'set' }).cardinality).toBe('single');
    expect(buildArgSpec({ id: 'a', long: 'a', action: 'append' }).cardinality).toBe('multiple');
    expect(buildArgSpec({ id: 'a', long: 'a', action: 'set-true' }).cardinality).toBe('flag');
    expect(buildArgSpec({ id: 'a', long: 'a', action: 'set-false' }).cardinality).toBe('flag');
    expect(buildArgSpec({ id: 'a', long: 'a', action: 'count' }).cardinality).toBe('counter');
  });

  it('prefers the long spelling as invocation token', () => {
    const spec = buildArgSpec({ id: 'verbose', long: 'verbose', short: 'v', action: 'count' });

    expect(spec.invocationToken).toBe('--verbose');
    expect(spec.spellings).toEqual(['--verbose', '-v']);
  });

  it('falls back to the short spelling', () => {
    const spec = buildArgSpec({ id: 'verbose', short: 'v', action: 'count' });

    expect(spec.invocationToken).toBe('-v');
  });

  it('leaves positional arguments without a token', () => {
    const spec = buildArgSpec({ id: 'input', required: true });

    expect(spec.invocationToken).toBeUndefined();
    expect(spec.spellings).toEqual([]);
    expect(spec.required).toBe(true);
  });

  it('copies help, defaults, allowed values and hints', () => {
    const spec = buildArgSpec({
      id: 'output_dir',
      long: 'out',
      help: 'short help',
      longHelp: 'long help',
      requireEquals: true,
      defaultValues: ['dist'],
      possibleValues: ['dist', 'build'],
      valueHint: 'any-path',
    });

    expect(spec).toEqual({
      id: 'output_dir',
      displayName: 'Output dir',
      spellings: ['--out'],
      helpText: 'long help',
      required: false,
      useEquals: true,
      defaultValues: ['dist'],
      allowedValues: ['dist', 'build'],
      pathHint: 'either',
      cardinality: 'single',
      invocationToken: '--out',
    });
  });

  it('uses the short help when no long help exists', () => {
    expect(buildArgSpec({ id: 'a', help: 'short help' }).helpText).toBe('short help');
  });

  it('records the value a switch takes when given', () => {
    expect(buildArgSpec({ id: 'color', long: 'color', action: 'set-true' })).toMatchObject({
      cardinality: 'flag',
      invocationToken: '--color',
      valueWhenPresent: true,
    });
    expect(buildArgSpec({ id: 'no_color', long: 'no-color', action: 'set-false' })).toMatchObject({
      cardinality: 'flag',
      invocationToken: '--no-color',
      valueWhenPresent: false,
    });
  });

  it('rejects an action it does not know', () => {
    const definition: ArgDefinition = JSON.parse('{"id":"a","long":"a","action":"toggle"}');

    expect(() => buildArgSpec(definition, ['run'])).toThrow("Argument 'a' has unknown action 'toggle' (in 'run')");
  });

  it('rejects a flag without any spelling', () => {
    expect(() => buildArgSpec({ id: 'quiet', action: 'set-true' })).toThrow(SchemaError);
  });

  it('rejects a counter without any spelling', () => {
    expect(() => buildArgSpec({ id: 'verbose', action: 'count' }, ['run'])).toThrow(
      "Argument 'verbose' with action 'count' needs a long or short spelling (in 'run')"
    );
  });

  it('rejects multi-character short spellings', () => {
    expect(() => buildArgSpec({ id: 'a', short: 'ab' })).toThrow(SchemaError);
  });

  it('rejects long spellings that carry dashes', () => {
    expect(() => buildArgSpec({ id: 'a', long: '--a' })).toThrow(SchemaError);
  });

  it('rejects an empty id', () => {
    expect(() => buildArgSpec({ id: '' })).toThrow('Argument id must not be empty');
  });
});

describe('isArgAction', () => {
  it('accepts exactly the known actions', () => {
    expect(['set', 'append', 'set-true', 'set-false', 'count'].every(isArgAction)).toBe(true);
    expect(isArgAction('toggle')).toBe(false);
    expect(isArgAction('')).toBe(false);
  });
});

describe('buildCommandSpec', () => {
  it('builds the full showcase tree', () => {
    const spec = buildCommandSpec(showcaseDefinition);

    expect(spec.name).toBe('showcase');
    expect(spec.args.map((arg) => arg.id)).toEqual([
      'required_field',
      'optional_field',
      'field_with_default',
      'flag',
      'count_occurrences_as_a_nice_counter',
    ]);
    expect(spec.subcommands.map((child) => child.name)).toEqual(['subcommand-a', 'subcommand-b']);
    expect(spec.subcommandRequired).toBe(true);

    const subA = findSubcommand(spec, 'subcommand-a');
    expect(subA?.subcommands.map((child) => child.name)).toEqual([
      'inner-subcommand-a',
      'inner-subcommand-b',
      'inner-subcommand-c',
    ]);
    const innerB = subA !== undefined ? findSubcommand(subA, 'inner-subcommand-b') : undefined;
    expect(innerB?.subcommands.map((child) => child.name)).toEqual(['a', 'b']);
  });

  it('derives display names for commands', () => {
    const spec = buildCommandSpec(showcaseDefinition);

    expect(spec.subcommands[0]?.displayName).toBe('Subcommand a');
  });

  it('ignores subcommandRequired when there are no sub-commands', () => {
    const spec = buildCommandSpec({ name: 'tool', subcommandRequired: true });

    expect(spec.subcommandRequired).toBe(false);
  });

  it('rejects duplicate argument ids', () => {
    expect(() =>
      buildCommandSpec({ name: 'tool', args: [{ id: 'a', long: 'a' }, { id: 'a', long: 'b' }] })
    ).toThrow("Duplicate argument id 'a'");
  });

  it('rejects duplicate spellings', () => {
    expect(() =>
      buildCommandSpec({
        name: 'tool',
        args: [
          { id: 'a', short: 'x' },
          { id: 'b', short: 'x' },
        ],
      })
    ).toThrow("Duplicate spelling '-x'");
  });

  it('rejects duplicate sub-command names', () => {
    expect(() =>
      buildCommandSpec({ name: 'tool', subcommands: [{ name: 'run' }, { name: 'run' }] })
    ).toThrow("Duplicate sub-command 'run'");
  });

  it('reports the path of nested schema errors', () => {
    let caught: unknown;
    try {
      buildCommandSpec({
        name: 'tool',
        subcommands: [{ name: 'run', args: [{ id: 'dry', action: 'set-true' }] }],
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaError);
    if (caught instanceof SchemaError) {
      expect(caught.path).toEqual(['run']);
      expect(caught.argId).toBe('dry');
    }
  });
});
