/**
 * Child Process Supervisor.
 *
 * A {@link ChildProcessHandle} launches one external process, drains its
 * stdout and stderr into an {@link OutputBuffer} while it runs, and can
 * terminate it. Status reads never block.
 *
 * @packageDocumentation
 */

import { once } from 'node:events';
import { access, constants, stat } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { execa, type Options, type Subprocess } from 'execa';
import { createLogger, type Logger } from '../utils/logger.js';
import { OutputBuffer } from './output-buffer.js';
import type {
  ChildStatus,
  ExecutionRequest,
  OutputSource,
  SignalName,
  SpawnError,
  SpawnResult,
  StdinSource,
} from './types.js';

/** Signal sent by {@link ChildProcessHandle.kill} unless configured otherwise. */
export const DEFAULT_KILL_SIGNAL: SignalName = 'SIGTERM';

/** Milliseconds between the kill signal and the SIGKILL escalation. */
export const DEFAULT_KILL_GRACE_MS = 5000;

/**
 * Options for a {@link ChildProcessHandle}.
 */
export interface ChildProcessOptions {
  /** @defaultValue 'SIGTERM' */
  readonly killSignal?: SignalName;
  /** @defaultValue 5000 */
  readonly killGraceMs?: number;
  readonly logger?: Logger;
}

/**
 * Error thrown when a handle is asked to spawn a second time.
 */
export class HandleReusedError extends Error {
  constructor() {
    super('A ChildProcessHandle can only spawn once; create a new handle for the next run');
    this.name = 'HandleReusedError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toSpawnError(error: unknown, program: string): SpawnError {
  switch (errnoCode(error)) {
    case 'ENOENT':
      return { code: 'not-found', message: `Program '${program}' was not found`, program };
    case 'EACCES':
    case 'EPERM':
      return { code: 'permission-denied', message: `Permission denied starting '${program}'`, program };
    default:
      return { code: 'io', message: `Failed to start '${program}': ${errorMessage(error)}`, program };
  }
}

function stdinOptions(stdin: StdinSource | undefined): Options {
  if (stdin === undefined) {
    return { stdin: 'ignore' };
  }
  return stdin.kind === 'text' ? { input: stdin.text } : { inputFile: stdin.path };
}

/**
 * Checks the inputs that would otherwise surface as confusing spawn errors.
 */
async function precheck(request: ExecutionRequest): Promise<SpawnError | undefined> {
  const program = request.argv[0];
  if (program === undefined || program === '') {
    return { code: 'empty-argv', message: 'Nothing to run: the argument vector is empty' };
  }

  const emptyKey = (request.envOverrides ?? []).find(([key]) => key === '');
  if (emptyKey !== undefined) {
    return { code: 'empty-env-key', message: 'Environment variable names must not be empty', key: '' };
  }

  if (request.stdin?.kind === 'file') {
    try {
      await access(request.stdin.path, constants.R_OK);
    } catch (error) {
      return {
        code: 'stdin-file',
        message: `Cannot read stdin file '${request.stdin.path}': ${errorMessage(error)}`,
        program,
      };
    }
  }

  if (request.workingDirectory !== undefined) {
    const isDirectory = await stat(request.workingDirectory).then(
      (stats) => stats.isDirectory(),
      () => false
    );
    if (!isDirectory) {
      return {
        code: 'io',
        message: `Working directory '${request.workingDirectory}' does not exist or is not a directory`,
        program,
      };
    }
  }

  return undefined;
}

/**
 * Supervises a single child process.
 *
 * A handle is single-use: create a new one for each run.
 *
 * @example
 * ```typescript
 * const handle = new ChildProcessHandle();
 * const spawned = await handle.spawn({ argv: ['echo', 'hello'] });
 * if (spawned.success) {
 *   await handle.wait();
 *   handle.output.snapshot(); // "hello\n"
 * }
 * ```
 */
export class ChildProcessHandle {
  /** Captured output, growing while the child runs. */
  readonly output = new OutputBuffer();
  private readonly killSignal: SignalName;
  private readonly killGraceMs: number;
  private readonly logger: Logger;
  private currentStatus: ChildStatus = { state: 'not-started' };
  private started = false;
  private killRequested = false;
  private subprocess: Subprocess | undefined;
  private escalation: NodeJS.Timeout | undefined;
  private completion: Promise<ChildStatus> | undefined;

  constructor(options: ChildProcessOptions = {}) {
    this.killSignal = options.killSignal ?? DEFAULT_KILL_SIGNAL;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.logger = options.logger ?? createLogger('ChildProcessHandle');
  }

  /**
   * Current lifecycle state. Leaves `running` as soon as the child exits,
   * even while processes it started still hold its output open.
   */
  get status(): ChildStatus {
    return this.currentStatus;
  }

  isRunning(): boolean {
    return this.currentStatus.state === 'running';
  }

  /**
   * Launches the child.
   *
   * Resolves once the process has started or failed to start. Validation
   * failures (empty argv, empty env key) leave the status at `not-started`;
   * launch failures move it to `spawn-failed`.
   *
   * @throws HandleReusedError when called more than once.
   */
  async spawn(request: ExecutionRequest): Promise<SpawnResult> {
    if (this.started) {
      throw new HandleReusedError();
    }
    this.started = true;

    const rejected = await precheck(request);
    if (rejected !== undefined) {
      if (rejected.code !== 'empty-argv' && rejected.code !== 'empty-env-key') {
        this.currentStatus = { state: 'spawn-failed', error: rejected };
      }
      this.logger.warn('spawn_rejected', { code: rejected.code, message: rejected.message });
      return { success: false, error: rejected };
    }

    const [program = '', ...args] = request.argv;
    const options: Options = {
      buffer: false,
      reject: false,
      // Own process group, so kill() reaches everything the child started.
      detached: process.platform !== 'win32',
      env: Object.fromEntries(request.envOverrides ?? []),
      killSignal: this.killSignal,
      forceKillAfterDelay: this.killGraceMs,
      ...stdinOptions(request.stdin),
      ...(request.workingDirectory !== undefined ? { cwd: request.workingDirectory } : {}),
    };
    const subprocess = execa(program, args, options);

    try {
      const settledEarly = await Promise.race([
        once(subprocess, 'spawn').then(() => undefined),
        subprocess.then((result) => result),
      ]);
      if (settledEarly !== undefined) {
        throw new Error(`process ended before it started (exit code ${String(settledEarly.exitCode)})`);
      }
    } catch (error) {
      const spawnError = toSpawnError(error, program);
      this.currentStatus = { state: 'spawn-failed', error: spawnError };
      this.logger.warn('spawn_failed', { program, code: spawnError.code, message: spawnError.message });
      await subprocess;
      return { success: false, error: spawnError };
    }

    this.subprocess = subprocess;
    this.currentStatus = { state: 'running', pid: subprocess.pid };
    this.logger.info('child_spawned', { program, args, pid: subprocess.pid });

    const exited = new Promise<void>((resolve) => {
      if (subprocess.exitCode !== null || subprocess.signalCode !== null) {
        this.settle(subprocess.exitCode, subprocess.signalCode);
        resolve();
        return;
      }
      subprocess.once('exit', (code, signal) => {
        this.settle(code, signal);
        resolve();
      });
    });
    const drains = Promise.all([this.drain(subprocess.stdout, 'stdout'), this.drain(subprocess.stderr, 'stderr')]);
    this.completion = this.supervise(subprocess, exited, drains);

    return { success: true, pid: subprocess.pid };
  }

  /**
   * Asks the child and every process it started to stop: the configured
   * signal first, SIGKILL after the grace period.
   *
   * @returns false, with no state change, when nothing is running or a kill
   * was already requested.
   */
  kill(): boolean {
    if (this.currentStatus.state !== 'running' || this.killRequested || this.subprocess === undefined) {
      this.logger.debug('kill_ignored', { state: this.currentStatus.state, killRequested: this.killRequested });
      return false;
    }
    this.killRequested = true;
    const delivered = this.signalGroup(this.killSignal);
    this.escalation = setTimeout(() => {
      this.logger.warn('kill_escalated', { signal: 'SIGKILL', afterMs: this.killGraceMs });
      this.signalGroup('SIGKILL');
    }, this.killGraceMs);
    this.escalation.unref();
    this.logger.info('kill_requested', { signal: this.killSignal, delivered });
    return true;
  }

  /**
   * Resolves with the final status once the child has ended and its output is
   * fully drained. Resolves immediately when no child is running.
   */
  wait(): Promise<ChildStatus> {
    return this.completion ?? Promise.resolve(this.currentStatus);
  }

  /**
   * Signals the child's process group, or the child alone where there is no
   * group to signal.
   */
  private signalGroup(signal: SignalName): boolean {
    const subprocess = this.subprocess;
    if (subprocess === undefined) {
      return false;
    }
    const pid = subprocess.pid;
    if (pid !== undefined && process.platform !== 'win32') {
      try {
        process.kill(-pid, signal);
        return true;
      } catch (error) {
        this.logger.debug('group_signal_failed', { pid, signal, message: errorMessage(error) });
      }
    }
    return subprocess.kill(signal);
  }

  private settle(code: number | null, signal: string | null): void {
    this.currentStatus =
      this.killRequested && signal !== null
        ? { state: 'killed', signal }
        : { state: 'exited', exitCode: code, signal };
    this.logger.info('child_exited', { ...this.currentStatus });
  }

  private async drain(stream: Readable | null, source: OutputSource): Promise<void> {
    if (stream === null) {
      return;
    }
    stream.setEncoding('utf8');
    try {
      for await (const chunk of stream) {
        this.output.append(source, String(chunk));
      }
    } catch (error) {
      this.logger.warn('output_drain_failed', { source, message: errorMessage(error) });
    }
  }

  private async supervise(
    subprocess: PromiseLike<unknown>,
    exited: Promise<void>,
    drains: Promise<unknown>
  ): Promise<ChildStatus> {
    try {
      await Promise.all([exited, subprocess, drains]);
    } catch (error) {
      this.logger.error('supervision_failed', { message: errorMessage(error) });
      if (this.currentStatus.state === 'running') {
        this.currentStatus = { state: 'exited', exitCode: null, signal: null };
      }
    }
    clearTimeout(this.escalation);
    this.subprocess = undefined;
    this.logger.info('child_finished', { ...this.currentStatus });
    return this.currentStatus;
  }
}
