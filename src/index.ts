/**
 * Public API of cargo-verify.
 */

export * from './schema/index.js';
export * from './config/index.js';
export * from './core/index.js';
export * from './process/index.js';
export { runCli, createProgram } from './cli/index.js';
export type { CliDeps } from './cli/index.js';
export { VerifyError, VerifyErrorCode } from './utils/errors.js';
