/**
 * Execution Orchestrator.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_LOCALIZATION,
  MESSAGE_IDS,
  formatMessage,
  isMessageId,
} from './messages.js';
export type { Localization, MessageId, MessageParams } from './messages.js';
export { CHILD_APP_ENV_VAR, Session } from './session.js';
export type {
  RunFailure,
  RunInputs,
  RunNotice,
  RunOutcome,
  SessionFeatures,
  SessionOptions,
} from './session.js';
