/**
 * Child Process Supervisor.
 *
 * @packageDocumentation
 */

export {
  ChildProcessHandle,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_KILL_SIGNAL,
  HandleReusedError,
} from './child-process.js';
export type { ChildProcessOptions } from './child-process.js';
export { OutputBuffer } from './output-buffer.js';
export { isSignalName } from './signals.js';
export type {
  ChildState,
  ChildStatus,
  ExecutionRequest,
  OutputChunk,
  OutputSource,
  SignalName,
  SpawnError,
  SpawnErrorCode,
  SpawnResult,
  StdinSource,
} from './types.js';
