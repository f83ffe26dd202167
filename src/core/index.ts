export * from './logger/index.js';
export * from './mcp/index.js';
export * from './brain/index.js';
export * from './session/index.js';
export * from './env.js';
export { DEFAULT_CONFIG_PATH, findPackageRoot, resolveConfigPath } from './utils/path.js';
