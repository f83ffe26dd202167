export { LLMConfigSchema, SUPPORTED_PROVIDERS } from './config.js';
export type { LLMConfig, LLMConfigInput } from './config.js';
export { OpenAIService, createOpenAIService } from './services/openai.js';
export type * from './services/types.js';
