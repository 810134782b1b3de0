/**
 * Schema module — single source of truth for the chain's data shapes.
 * Zod schemas for validated inputs, plain interfaces for run results.
 */

export * from './chain.js';
export { chainPassed } from './results.js';
export type { StepOutcome, ChainOutcome } from './results.js';
