/**
 * Application entry point.
 *
 * @packageDocumentation
 */

export { isChildInvocation, runApp } from './run-app.js';
export type { AppHandler, Presenter, RunAppOptions } from './run-app.js';
