/**
 * Application entry point.
 *
 * The same program runs twice: once as the form a presentation layer draws,
 * and once more, re-entered by its own {@link Session}, as the child that
 * actually does the work with the assembled arguments.
 *
 * @packageDocumentation
 */

import { loadConfig } from '../config/loader.js';
import type { ArgMatches } from '../matcher/arg-matches.js';
import { ArgMatchError, matchArgs } from '../matcher/matcher.js';
import { CHILD_APP_ENV_VAR, Session } from '../orchestrator/session.js';
import { buildCommandSpec } from '../schema/builder.js';
import type { CommandDefinition } from '../schema/types.js';
import { createCommandStateTree } from '../state/command-state.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Does the work of the program with its parsed arguments.
 */
export type AppHandler = (matches: ArgMatches) => void | Promise<void>;

/**
 * Shows a session to the user. Resolves when the user is done with it.
 */
export type Presenter = (session: Session) => void | Promise<void>;

/**
 * Options for {@link runApp}.
 */
export interface RunAppOptions {
  readonly present: Presenter;
  /** Directory holding `argpanel.toml`. Defaults to `process.cwd()`. */
  readonly cwd?: string;
  /** Defaults to `process.env`. The child marker is removed from it. */
  readonly env?: NodeJS.ProcessEnv;
  /** Defaults to `process.argv`. */
  readonly argv?: readonly string[];
  /** Defaults to `process.execPath`. */
  readonly execPath?: string;
  /** Defaults to `process.execArgv`. */
  readonly execArgv?: readonly string[];
  /** Replaces the logger built from the `[logging]` configuration. */
  readonly logger?: Logger;
}

/**
 * Whether the current process was launched by a {@link Session} to do the work.
 */
export function isChildInvocation(env: NodeJS.ProcessEnv = process.env): boolean {
  const marker = env[CHILD_APP_ENV_VAR];
  return marker !== undefined && marker !== '';
}

/**
 * Runs a program described by `definition`.
 *
 * In the child, parses the arguments and calls `handler`. Otherwise loads
 * `argpanel.toml`, builds a session that re-enters this script, and passes it
 * to `options.present`.
 *
 * @throws ArgMatchError in the child when the arguments do not match the definition.
 * @throws SchemaError when the definition is inconsistent.
 *
 * @example
 * ```typescript
 * await runApp(
 *   { name: 'greet', args: [{ id: 'name', required: true }] },
 *   (matches) => console.log(`Hello, ${matches.getString('name') ?? ''}!`),
 *   { present: (session) => renderForm(session) }
 * );
 * ```
 */
export async function runApp(
  definition: CommandDefinition,
  handler: AppHandler,
  options: RunAppOptions
): Promise<void> {
  const env = options.env ?? process.env;
  const argv = options.argv ?? process.argv;
  const spec = buildCommandSpec(definition);

  if (isChildInvocation(env)) {
    delete env[CHILD_APP_ENV_VAR];
    const matched = matchArgs(spec, argv.slice(2));
    if (!matched.success) {
      throw new ArgMatchError(matched.error);
    }
    await handler(matched.matches);
    return;
  }

  const config = loadConfig({
    env,
    ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
    ...(options.logger !== undefined ? { logger: options.logger.child('Config') } : {}),
  });
  const logger = options.logger ?? createLogger('Runtime', config.logging.debug);

  const script = argv[1];
  const launcher =
    script === undefined
      ? undefined
      : [options.execPath ?? process.execPath, ...(options.execArgv ?? process.execArgv), script];

  const session = new Session(createCommandStateTree(spec, { logger: logger.child('CommandStateTree') }), {
    features: {
      env: config.features.env,
      stdin: config.features.stdin,
      workingDirectory: config.features.working_dir,
    },
    localization: config.localization,
    killSignal: config.process.kill_signal,
    killGraceMs: config.process.kill_grace_ms,
    logger: logger.child('Session'),
    ...(launcher !== undefined ? { launcher } : {}),
  });

  logger.debug('session_ready', { command: spec.name, launcher });
  await options.present(session);
}
