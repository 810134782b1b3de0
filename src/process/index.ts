/**
 * Process module.
 * The only place that touches the search path or spawns children.
 */

export * from './locator.js';
export * from './runner.js';
export { createMockLocator, createMockRunner } from './mock.js';
export type { RecordedCall } from './mock.js';
