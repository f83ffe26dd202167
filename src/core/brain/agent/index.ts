export { Assistant } from './agent.js';
export type { AssistantOptions } from './agent.js';
export {
	AgentConfigSchema,
	ShutdownConfigSchema,
	TerminalConfigSchema,
	DEFAULT_SYSTEM_PROMPT,
} from './config.js';
export type { AgentConfig, AgentConfigInput } from './config.js';
export { loadAgentConfig, expandEnvVars } from './loader.js';
