/**
 * Localizable messages.
 *
 * The core never builds display text itself. Every user-facing string is
 * looked up by {@link MessageId} in a {@link Localization} table, which a host
 * can override through the `[localization]` configuration section.
 *
 * @packageDocumentation
 */

/**
 * Identifier of a localizable message.
 */
export type MessageId =
  | 'optional'
  | 'select-file'
  | 'select-directory'
  | 'new-value'
  | 'reset'
  | 'reset-to-default'
  | 'required-field-missing'
  | 'invalid-value'
  | 'malformed-argument'
  | 'unexpected-argument'
  | 'missing-subcommand'
  | 'arguments'
  | 'env-variables'
  | 'env-key-empty'
  | 'input'
  | 'text'
  | 'file'
  | 'working-directory'
  | 'run'
  | 'kill'
  | 'running'
  | 'spawn-failed';

/**
 * Every message id.
 */
export const MESSAGE_IDS: readonly MessageId[] = [
  'optional',
  'select-file',
  'select-directory',
  'new-value',
  'reset',
  'reset-to-default',
  'required-field-missing',
  'invalid-value',
  'malformed-argument',
  'unexpected-argument',
  'missing-subcommand',
  'arguments',
  'env-variables',
  'env-key-empty',
  'input',
  'text',
  'file',
  'working-directory',
  'run',
  'kill',
  'running',
  'spawn-failed',
] as const;

/**
 * Message templates by id. `{name}` placeholders are filled by
 * {@link formatMessage}.
 */
export type Localization = Readonly<Record<MessageId, string>>;

/**
 * Placeholder values for a message.
 */
export type MessageParams = Readonly<Record<string, string>>;

/**
 * The English message table.
 *
 * Placeholders:
 * - `required-field-missing`: `{name}`
 * - `invalid-value`: `{name}`, `{value}`, `{allowed}`
 * - `malformed-argument`: `{name}`
 * - `unexpected-argument`: `{token}`, `{command}`
 * - `missing-subcommand`: `{command}`
 * - `spawn-failed`: `{program}`, `{reason}`
 */
export const DEFAULT_LOCALIZATION: Localization = {
  optional: '(Optional)',
  'select-file': 'Select file...',
  'select-directory': 'Select directory...',
  'new-value': 'New value',
  reset: 'Reset',
  'reset-to-default': 'Reset to default',
  'required-field-missing': "Argument '{name}' is required",
  'invalid-value': "'{value}' is not a valid value for '{name}'. Possible values: {allowed}",
  'malformed-argument': "Argument '{name}' is not written the way the program expects",
  'unexpected-argument': "Unexpected argument '{token}' for '{command}'",
  'missing-subcommand': "Choose a sub-command of '{command}'",
  arguments: 'Arguments',
  'env-variables': 'Environment variables',
  'env-key-empty': "Environment variable can't be empty",
  input: 'Input',
  text: 'Text',
  file: 'File',
  'working-directory': 'Working directory',
  run: 'Run',
  kill: 'Kill',
  running: 'Running...',
  'spawn-failed': "Could not start '{program}': {reason}",
};

/**
 * Narrows a string to a {@link MessageId}.
 */
export function isMessageId(value: string): value is MessageId {
  return MESSAGE_IDS.some((id) => id === value);
}

/**
 * Renders a message, replacing each `{name}` with `params.name`.
 *
 * Placeholders without a matching parameter are left as they are.
 *
 * @example
 * ```typescript
 * formatMessage(DEFAULT_LOCALIZATION, 'required-field-missing', { name: 'Input' });
 * // "Argument 'Input' is required"
 * ```
 */
export function formatMessage(localization: Localization, id: MessageId, params: MessageParams = {}): string {
  return localization[id].replace(/\{([A-Za-z0-9_]+)\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(params, key) ? (params[key] ?? placeholder) : placeholder
  );
}
