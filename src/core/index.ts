/**
 * Core module — the task-chain runner.
 * Pure orchestration over injected locator and runner capabilities.
 */

export { resolveInvocationName } from './invocation.js';
export { showHelpIfRequested } from './help.js';
export { requireTools } from './preflight.js';
export { runChain, formatCommandLine } from './chain.js';
export type { ChainHooks } from './chain.js';
export { runVerify } from './verify.js';
export type { VerifyOptions } from './verify.js';
