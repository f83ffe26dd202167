/**
 * MCP Utils - async coordination primitives
 */

export { AsyncLock } from './async-lock.js';
export { DeadlineExceededError, withDeadline, delay } from './deadline.js';

export type { DeadlineOptions } from './deadline.js';
