export * from './agent/index.js';
export * from './llm/index.js';
export * from './reasoning/index.js';
