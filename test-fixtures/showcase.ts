import type { CommandDefinition } from '../src/schema/types.js';

/**
 * A definition touching every argument kind and three levels of sub-commands.
 */
export const showcaseDefinition: CommandDefinition = {
  name: 'showcase',
  about: 'Help is displayed at the top',
  args: [
    { id: 'required_field', help: 'Argument help is displayed as tooltips', required: true },
    { id: 'optional_field', long: 'optional-field' },
    { id: 'field_with_default', long: 'field-with-default', defaultValues: ['default value'] },
    { id: 'flag', long: 'flag', action: 'set-true' },
    {
      id: 'count_occurrences_as_a_nice_counter',
      long: 'count-occurrences-as-a-nice-counter',
      short: 'c',
      action: 'count',
    },
  ],
  subcommandRequired: true,
  subcommands: [
    {
      name: 'subcommand-a',
      about: 'Subcommands also display help',
      args: [
        { id: 'native_path_picker', long: 'native-path-picker', valueHint: 'any-path' },
        { id: 'choose_one', required: true, possibleValues: ['One', 'Two', 'Three'] },
      ],
      subcommandRequired: true,
      subcommands: [
        {
          name: 'inner-subcommand-a',
          args: [{ id: 'multiple_values', long: 'multiple-values', short: 'm', action: 'append' }],
        },
        {
          name: 'inner-subcommand-b',
          about: 'About',
          subcommandRequired: true,
          subcommands: [{ name: 'a', about: 'About 2' }, { name: 'b' }],
        },
        { name: 'inner-subcommand-c' },
      ],
    },
    { name: 'subcommand-b' },
  ],
};
