/**
 * Type definitions for the child process supervisor.
 *
 * @packageDocumentation
 */

import type { constants } from 'node:os';

/**
 * Name of a POSIX signal, such as `SIGTERM`.
 */
export type SignalName = keyof typeof constants.signals;

/**
 * Where the child's standard input comes from.
 */
export type StdinSource =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'file'; readonly path: string };

/**
 * Everything needed to launch one child process.
 */
export interface ExecutionRequest {
  /** Program followed by its arguments. */
  readonly argv: readonly string[];
  /** Variables added to the inherited environment, applied in order. */
  readonly envOverrides?: readonly (readonly [string, string])[];
  /** Standard input. Closed when absent. */
  readonly stdin?: StdinSource;
  /** Working directory. Inherited when absent. */
  readonly workingDirectory?: string;
}

/**
 * Category of a launch failure.
 */
export type SpawnErrorCode =
  | 'empty-env-key'
  | 'empty-argv'
  | 'not-found'
  | 'permission-denied'
  | 'stdin-file'
  | 'io';

/**
 * Why a child could not be launched.
 */
export interface SpawnError {
  readonly code: SpawnErrorCode;
  readonly message: string;
  /** The program that failed to start. */
  readonly program?: string;
  /** The offending environment key, for `empty-env-key`. */
  readonly key?: string;
}

/**
 * Lifecycle state of a child process.
 */
export type ChildStatus =
  | { readonly state: 'not-started' }
  | { readonly state: 'running'; readonly pid: number | undefined }
  | { readonly state: 'exited'; readonly exitCode: number | null; readonly signal: string | null }
  | { readonly state: 'killed'; readonly signal: string }
  | { readonly state: 'spawn-failed'; readonly error: SpawnError };

/**
 * Discriminant of {@link ChildStatus}.
 */
export type ChildState = ChildStatus['state'];

/**
 * Result of {@link ChildProcessHandle.spawn}.
 */
export type SpawnResult =
  | { readonly success: true; readonly pid: number | undefined }
  | { readonly success: false; readonly error: SpawnError };

/**
 * Which stream a chunk of output came from.
 */
export type OutputSource = 'stdout' | 'stderr';

/**
 * One piece of captured output.
 */
export interface OutputChunk {
  readonly source: OutputSource;
  readonly text: string;
}
