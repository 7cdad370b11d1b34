/**
 * Execution Orchestrator.
 *
 * A {@link Session} is what a presentation layer drives: it owns the Command
 * State Tree, the optional run inputs and the currently tracked child process.
 * {@link Session.run} validates the tree, paints failures onto the arguments
 * they belong to and launches the child.
 *
 * @packageDocumentation
 */

import { assembleArgs, type AssemblyError } from '../assembler/assembler.js';
import type { FeatureConfig } from '../config/types.js';
import { describeMatchError, matchArgs } from '../matcher/matcher.js';
import type { MatchError } from '../matcher/types.js';
import type { CommandStateTree } from '../state/command-state.js';
import { ChildProcessHandle } from '../supervisor/child-process.js';
import type { ChildStatus, ExecutionRequest, SignalName, SpawnError, StdinSource } from '../supervisor/types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  DEFAULT_LOCALIZATION,
  formatMessage,
  type Localization,
  type MessageId,
  type MessageParams,
} from './messages.js';

/**
 * Environment variable set on a child launched through the launcher, telling
 * the re-entered program to parse its arguments instead of presenting a form.
 */
export const CHILD_APP_ENV_VAR = 'ARGPANEL_CHILD_APP';

/**
 * Which optional run inputs the presentation layer offers.
 */
export interface SessionFeatures {
  readonly env: FeatureConfig;
  readonly stdin: FeatureConfig;
  readonly workingDirectory: FeatureConfig;
}

/**
 * Optional inputs of the next run. Ignored while the matching feature is off.
 */
export interface RunInputs {
  /** Environment variable overrides, applied in order. */
  env: [string, string][];
  /** Standard input. Closed when undefined. */
  stdin: StdinSource | undefined;
  /** Working directory. Inherited when empty. */
  workingDirectory: string;
}

/**
 * Options for a {@link Session}.
 */
export interface SessionOptions {
  /** Features to offer. Unset features are disabled. */
  readonly features?: Partial<SessionFeatures>;
  /** @defaultValue DEFAULT_LOCALIZATION */
  readonly localization?: Localization;
  readonly killSignal?: SignalName;
  readonly killGraceMs?: number;
  /**
   * Tokens that replace the program name, such as
   * `[process.execPath, scriptPath]` to re-enter the current program. When set,
   * the child also gets {@link CHILD_APP_ENV_VAR}.
   */
  readonly launcher?: readonly string[];
  readonly logger?: Logger;
}

/**
 * A localized message for the presentation layer.
 */
export interface RunNotice {
  readonly messageId: MessageId;
  readonly params: MessageParams;
  /** The message rendered with the session's localization. */
  readonly text: string;
}

/**
 * Why a run did not start.
 *
 * - `validation`: the tree is incomplete or a value is not accepted; when an
 *   argument is named, the notice was also painted onto it
 * - `env-key-empty`: an environment override has no name
 * - `spawn-failed`: the child could not be launched
 */
export type RunFailure =
  | {
      readonly kind: 'validation';
      readonly notice: RunNotice;
      readonly argId: string | undefined;
      readonly path: readonly string[];
    }
  | { readonly kind: 'env-key-empty'; readonly notice: RunNotice }
  | { readonly kind: 'spawn-failed'; readonly notice: RunNotice; readonly error: SpawnError };

/**
 * Result of {@link Session.run}.
 */
export type RunOutcome =
  | { readonly success: true; readonly handle: ChildProcessHandle }
  | { readonly success: false; readonly failure: RunFailure };

const DISABLED: FeatureConfig = { enabled: false, description: undefined };

/**
 * Orchestrates validation and execution for one command tree.
 *
 * @example
 * ```typescript
 * const session = new Session(createCommandStateTree(spec));
 * session.tree.root.setSingle('input', 'notes.txt');
 * const outcome = await session.run();
 * if (!outcome.success) {
 *   console.error(outcome.failure.notice.text);
 * }
 * ```
 */
export class Session {
  readonly tree: CommandStateTree;
  readonly features: SessionFeatures;
  readonly localization: Localization;
  /** Inputs of the next run. */
  readonly inputs: RunInputs = { env: [], stdin: undefined, workingDirectory: '' };
  private readonly killSignal: SignalName | undefined;
  private readonly killGraceMs: number | undefined;
  private readonly launcher: readonly string[] | undefined;
  private readonly logger: Logger;
  private tracked: ChildProcessHandle | undefined;

  constructor(tree: CommandStateTree, options: SessionOptions = {}) {
    this.tree = tree;
    this.features = {
      env: options.features?.env ?? DISABLED,
      stdin: options.features?.stdin ?? DISABLED,
      workingDirectory: options.features?.workingDirectory ?? DISABLED,
    };
    this.localization = options.localization ?? DEFAULT_LOCALIZATION;
    this.killSignal = options.killSignal;
    this.killGraceMs = options.killGraceMs;
    this.launcher = options.launcher;
    this.logger = options.logger ?? createLogger('Session');
  }

  /**
   * The handle of the most recent launch attempt, if any.
   */
  get handle(): ChildProcessHandle | undefined {
    return this.tracked;
  }

  /**
   * Status of the tracked child, `not-started` when there is none.
   */
  get status(): ChildStatus {
    return this.tracked?.status ?? { state: 'not-started' };
  }

  isRunning(): boolean {
    return this.tracked?.isRunning() ?? false;
  }

  /**
   * Kills the tracked child.
   *
   * @returns false when nothing is running or a kill was already requested.
   */
  kill(): boolean {
    return this.tracked?.kill() ?? false;
  }

  /**
   * All output of the tracked child so far.
   */
  outputSnapshot(): string {
    return this.tracked?.output.snapshot() ?? '';
  }

  /**
   * Renders a message with the session's localization.
   */
  message(id: MessageId, params: MessageParams = {}): string {
    return formatMessage(this.localization, id, params);
  }

  /**
   * Validates the tree and launches a child for it.
   *
   * Validation errors from the previous run are cleared first. A new handle
   * replaces the tracked one once launching is attempted, even when the launch
   * fails; a previous child that is still running is left alone.
   */
  async run(): Promise<RunOutcome> {
    this.tree.clearValidationErrors();

    const assembled = assembleArgs(this.tree);
    if (!assembled.success) {
      return this.reject(this.assemblyFailure(assembled.error));
    }

    const matched = matchArgs(this.tree.spec, assembled.argv.slice(1));
    if (!matched.success) {
      return this.reject(this.matchFailure(matched.error));
    }

    const envOverrides: [string, string][] = this.features.env.enabled ? [...this.inputs.env] : [];
    if (envOverrides.some(([key]) => key === '')) {
      return this.reject({ kind: 'env-key-empty', notice: this.notice('env-key-empty', {}) });
    }

    const argv = this.launcher === undefined ? assembled.argv : [...this.launcher, ...assembled.argv.slice(1)];
    if (this.launcher !== undefined) {
      envOverrides.push([CHILD_APP_ENV_VAR, '1']);
    }

    const stdin = this.features.stdin.enabled ? this.inputs.stdin : undefined;
    const workingDirectory = this.features.workingDirectory.enabled ? this.inputs.workingDirectory : '';
    const request: ExecutionRequest = {
      argv,
      envOverrides,
      ...(stdin !== undefined ? { stdin } : {}),
      ...(workingDirectory !== '' ? { workingDirectory } : {}),
    };

    const handle = new ChildProcessHandle({
      ...(this.killSignal !== undefined ? { killSignal: this.killSignal } : {}),
      ...(this.killGraceMs !== undefined ? { killGraceMs: this.killGraceMs } : {}),
      logger: this.logger.child('ChildProcessHandle'),
    });
    this.tracked = handle;
    this.logger.info('run_started', { argv });

    const spawned = await handle.spawn(request);
    if (!spawned.success) {
      const program = spawned.error.program ?? argv[0] ?? '';
      return this.reject({
        kind: 'spawn-failed',
        notice: this.notice('spawn-failed', { program, reason: spawned.error.message }),
        error: spawned.error,
      });
    }
    return { success: true, handle };
  }

  private notice(messageId: MessageId, params: MessageParams): RunNotice {
    return { messageId, params, text: this.message(messageId, params) };
  }

  private reject(failure: RunFailure): RunOutcome {
    this.logger.info('run_rejected', { kind: failure.kind, message: failure.notice.text });
    return { success: false, failure };
  }

  /**
   * Builds a validation failure and paints it onto the named argument.
   */
  private validationFailure(
    messageId: MessageId,
    params: MessageParams,
    argId: string | undefined,
    path: readonly string[]
  ): RunFailure {
    const notice = this.notice(messageId, params);
    if (argId !== undefined) {
      this.tree.applyValidationError(argId, notice.text, path);
    }
    return { kind: 'validation', notice, argId, path };
  }

  private displayName(argId: string, path: readonly string[]): string {
    const node = this.tree.nodeAt(path);
    return node.hasArg(argId) ? node.arg(argId).spec.displayName : argId;
  }

  private assemblyFailure(error: AssemblyError): RunFailure {
    switch (error.kind) {
      case 'missing-required':
        return this.validationFailure(
          'required-field-missing',
          { name: this.displayName(error.argId, error.path) },
          error.argId,
          error.path
        );
      case 'missing-subcommand':
        return this.validationFailure(
          'missing-subcommand',
          { command: this.tree.nodeAt(error.path).spec.name },
          undefined,
          error.path
        );
    }
  }

  private matchFailure(error: MatchError): RunFailure {
    this.logger.debug('vector_rejected', { reason: describeMatchError(error) });
    switch (error.kind) {
      case 'missing-required':
        return this.validationFailure(
          'required-field-missing',
          { name: this.displayName(error.argId, error.path) },
          error.argId,
          error.path
        );
      case 'missing-subcommand':
        return this.validationFailure(
          'missing-subcommand',
          { command: this.tree.nodeAt(error.path).spec.name },
          undefined,
          error.path
        );
      case 'invalid-value':
        return this.validationFailure(
          'invalid-value',
          {
            name: this.displayName(error.argId, error.path),
            value: error.value,
            allowed: error.allowed.join(', '),
          },
          error.argId,
          error.path
        );
      case 'missing-value':
      case 'equals-required':
      case 'unexpected-value':
        return this.validationFailure(
          'malformed-argument',
          { name: this.displayName(error.argId, error.path) },
          error.argId,
          error.path
        );
      case 'unknown-argument':
      case 'unexpected-positional':
        return this.validationFailure(
          'unexpected-argument',
          { token: error.token, command: this.tree.nodeAt(error.path).spec.name },
          undefined,
          error.path
        );
    }
  }
}
