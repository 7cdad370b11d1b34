/**
 * Argument Vector Assembler.
 *
 * @packageDocumentation
 */

export { assembleArgs } from './assembler.js';
export type { AssemblyError, AssemblyResult } from './assembler.js';
