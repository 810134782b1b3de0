/**
 * CLI module — thin wrapper over core.
 * Parses arguments, delegates to core, maps errors to exit codes.
 */

export { createProgram, runCli } from './program.js';
export type { CliDeps } from './program.js';
