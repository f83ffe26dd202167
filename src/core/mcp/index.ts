/**
 * MCP Module Index
 *
 * Exports the connection manager and everything needed to drive it.
 */

export { ConnectionManager, sanitizeToolName } from './manager.js';
export type { ConnectionManagerOptions, ConnectAllOptions } from './manager.js';

export * from './types.js';
export * from './config.js';
export * from './constants.js';
export { classifyCallResult, isEmptyContent, textOf } from './result.js';
export type { ClassifiedResult, ClassifyContext } from './result.js';

// Errors
export * from './errors/index.js';

// Connection - handles, transports, container helpers
export * from './connection/index.js';

// Utils - async coordination primitives
export * from './utils/index.js';
