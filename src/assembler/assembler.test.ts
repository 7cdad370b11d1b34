import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { showcaseDefinition } from '../../test-fixtures/showcase.js';
import { buildCommandSpec } from '../schema/builder.js';
import type { CommandDefinition } from '../schema/types.js';
import { CommandState, createCommandStateTree } from '../state/command-state.js';
import { assembleArgs } from './assembler.js';

function nodeFor(definition: CommandDefinition): CommandState {
  return new CommandState(buildCommandSpec(definition));
}

describe('assembleArgs', () => {
  it('emits the command name first', () => {
    const result = assembleArgs(nodeFor({ name: 'tool' }));

    expect(result).toEqual({ success: true, argv: ['tool'] });
  });

  it('joins token and value with = when required', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'flag', long: 'flag', requireEquals: true }] });
    node.setSingle('flag', 'x');

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool', '--flag=x'] });
  });

  it('emits token and value as two tokens otherwise', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'flag', long: 'flag' }] });
    node.setSingle('flag', 'x');

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool', '--flag', 'x'] });
  });

  it('emits positional values bare', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'input' }] });
    node.setSingle('input', 'file.txt');

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool', 'file.txt'] });
  });

  it('skips empty optional values', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'input' }, { id: 'mode', long: 'mode' }] });

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool'] });
  });

  it('never submits default values on its own', () => {
    const node = nodeFor({
      name: 'tool',
      args: [
        { id: 'mode', long: 'mode', defaultValues: ['fast'] },
        { id: 'tag', long: 'tag', action: 'append', defaultValues: ['a'] },
      ],
    });

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool'] });
  });

  it('fails on an empty required value', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'input', required: true }] });

    expect(assembleArgs(node)).toEqual({
      success: false,
      error: { kind: 'missing-required', argId: 'input', path: [] },
    });
  });

  it('reports the first missing required argument in declaration order', () => {
    const node = nodeFor({
      name: 'tool',
      args: [
        { id: 'first', required: true },
        { id: 'second', long: 'second', required: true },
      ],
    });

    const result = assembleArgs(node);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toEqual({ kind: 'missing-required', argId: 'first', path: [] });
    }
  });

  it('does not touch validation errors while assembling', () => {
    const node = nodeFor({
      name: 'tool',
      args: [
        { id: 'input', required: true },
        { id: 'other', long: 'other' },
      ],
    });
    node.applyValidationError('other', 'keep me');

    assembleArgs(node);

    expect(node.arg('input').validationError).toBeUndefined();
    expect(node.arg('other').validationError).toBe('keep me');
  });

  it('emits every multiple value in order, including empty ones', () => {
    const node = nodeFor({
      name: 'tool',
      args: [
        { id: 'include', short: 'I', action: 'append' },
        { id: 'define', long: 'define', action: 'append', requireEquals: true },
        { id: 'files', action: 'append' },
      ],
    });
    node.addMultiple('include', 'a');
    node.addMultiple('include', 'b');
    node.addMultiple('define', 'X=1');
    node.addMultiple('files', 'one');
    node.addMultiple('files', '');

    expect(assembleArgs(node)).toEqual({
      success: true,
      argv: ['tool', '-I', 'a', '-I', 'b', '--define=X=1', 'one', ''],
    });
  });

  it('has no required check for multiple values', () => {
    const node = nodeFor({
      name: 'tool',
      args: [{ id: 'files', action: 'append', required: true }],
    });

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool'] });
  });

  it('emits a flag only when enabled', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'dry', long: 'dry-run', action: 'set-true' }] });

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool'] });

    node.toggleFlag('dry');

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool', '--dry-run'] });
  });

  it('emits a set-false flag only once it is switched off', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'color', long: 'no-color', action: 'set-false' }] });

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool'] });

    node.setFlag('color', false);

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool', '--no-color'] });
  });

  it('repeats a counter token count times', () => {
    const node = nodeFor({ name: 'tool', args: [{ id: 'verbose', short: 'v', action: 'count' }] });
    node.incrementCounter('verbose');
    node.incrementCounter('verbose');
    node.incrementCounter('verbose');

    expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool', '-v', '-v', '-v'] });
  });

  it('interleaves positional and token arguments by declaration order', () => {
    const node = nodeFor({
      name: 'tool',
      args: [
        { id: 'source' },
        { id: 'mode', long: 'mode' },
        { id: 'target' },
      ],
    });
    node.setSingle('source', 'a');
    node.setSingle('mode', 'copy');
    node.setSingle('target', 'b');

    expect(assembleArgs(node)).toEqual({
      success: true,
      argv: ['tool', 'a', '--mode', 'copy', 'b'],
    });
  });

  describe('sub-commands', () => {
    it('fails when a required sub-command is not chosen', () => {
      const tree = createCommandStateTree(buildCommandSpec(showcaseDefinition));
      tree.root.setSingle('required_field', 'value');

      expect(assembleArgs(tree)).toEqual({
        success: false,
        error: { kind: 'missing-subcommand', path: [] },
      });
    });

    it('allows an optional sub-command to stay unchosen', () => {
      const node = nodeFor({ name: 'tool', subcommands: [{ name: 'run' }] });

      expect(assembleArgs(node)).toEqual({ success: true, argv: ['tool'] });
    });

    it('appends the chosen branch after the parent arguments', () => {
      const tree = createCommandStateTree(buildCommandSpec(showcaseDefinition));
      tree.root.setSingle('required_field', 'value');
      tree.root.toggleFlag('flag');
      tree.root.incrementCounter('count_occurrences_as_a_nice_counter');
      tree.selectSubcommand([], 'subcommand-a');
      const subA = tree.nodeAt(['subcommand-a']);
      subA.setSingle('choose_one', 'Two');
      subA.setSingle('native_path_picker', '/tmp/x');
      tree.selectSubcommand(['subcommand-a'], 'inner-subcommand-a');
      const inner = tree.nodeAt(['subcommand-a', 'inner-subcommand-a']);
      inner.addMultiple('multiple_values', 'm1');

      expect(assembleArgs(tree)).toEqual({
        success: true,
        argv: [
          'showcase',
          'value',
          '--flag',
          '--count-occurrences-as-a-nice-counter',
          'subcommand-a',
          '--native-path-picker',
          '/tmp/x',
          'Two',
          'inner-subcommand-a',
          '--multiple-values',
          'm1',
        ],
      });
    });

    it('reports the path of a nested missing required argument', () => {
      const tree = createCommandStateTree(buildCommandSpec(showcaseDefinition));
      tree.root.setSingle('required_field', 'value');
      tree.selectSubcommand([], 'subcommand-a');
      tree.selectSubcommand(['subcommand-a'], 'inner-subcommand-c');

      expect(assembleArgs(tree)).toEqual({
        success: false,
        error: { kind: 'missing-required', argId: 'choose_one', path: ['subcommand-a'] },
      });
    });

    it('reports the path of a nested missing sub-command', () => {
      const tree = createCommandStateTree(buildCommandSpec(showcaseDefinition));
      tree.root.setSingle('required_field', 'value');
      tree.selectSubcommand([], 'subcommand-a');
      tree.nodeAt(['subcommand-a']).setSingle('choose_one', 'One');
      tree.selectSubcommand(['subcommand-a'], 'inner-subcommand-b');

      expect(assembleArgs(tree)).toEqual({
        success: false,
        error: { kind: 'missing-subcommand', path: ['subcommand-a', 'inner-subcommand-b'] },
      });
    });
  });

  it('is a pure function of declaration order and values (property-based)', () => {
    const definition: CommandDefinition = {
      name: 'tool',
      args: [
        { id: 'input', required: true },
        { id: 'mode', long: 'mode', requireEquals: true },
        { id: 'tag', short: 't', action: 'append' },
        { id: 'dry', long: 'dry', action: 'set-true' },
        { id: 'verbose', short: 'v', action: 'count' },
      ],
    };
    const nonEmpty = fc.string({ minLength: 1, maxLength: 8 });

    fc.assert(
      fc.property(
        nonEmpty,
        fc.string({ maxLength: 8 }),
        fc.array(fc.string({ maxLength: 8 }), { maxLength: 5 }),
        fc.boolean(),
        fc.nat({ max: 6 }),
        (input, mode, tags, dry, verbose) => {
          const node = nodeFor(definition);
          node.setSingle('input', input);
          node.setSingle('mode', mode);
          tags.forEach((tag) => node.addMultiple('tag', tag));
          node.setFlag('dry', dry);
          for (let i = 0; i < verbose; i++) {
            node.incrementCounter('verbose');
          }

          const expected = [
            'tool',
            input,
            ...(mode === '' ? [] : [`--mode=${mode}`]),
            ...tags.flatMap((tag) => ['-t', tag]),
            ...(dry ? ['--dry'] : []),
            ...Array.from({ length: verbose }, () => '-v'),
          ];

          const first = assembleArgs(node);
          const second = assembleArgs(node);
          expect(first).toEqual({ success: true, argv: expected });
          expect(second).toEqual(first);
        }
      )
    );
  });
});
