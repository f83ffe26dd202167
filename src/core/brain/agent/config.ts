import { z } from 'zod';
import { ServerConfigsSchema } from '../../mcp/config.js';
import { DEFAULT_SHUTDOWN_TIMEOUT_MS } from '../../mcp/constants.js';
import { LLMConfigSchema } from '../llm/config.js';
import { numberFromString } from '../../utils/schema.js';

export const DEFAULT_SYSTEM_PROMPT =
	'You are a CLI conda assistant. Give helpful and detailed but concise replies. Prefer conda over pip when possible.';

export const ShutdownConfigSchema = z
	.object({
		timeoutMs: numberFromString(z.number().int().positive())
			.default(DEFAULT_SHUTDOWN_TIMEOUT_MS)
			.describe('Total time allowed to close every tool server after an agent turn'),
	})
	.strict();

export const TerminalConfigSchema = z
	.object({
		timeoutMs: numberFromString(z.number().int().positive())
			.default(60000)
			.describe('Time after which a terminal-mode command is killed'),
		shell: z.string().optional().describe('Shell used for terminal mode (defaults to the system shell)'),
	})
	.strict();

export const AgentConfigSchema = z
	.object({
		systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT).describe('System prompt for every conversation'),
		llm: LLMConfigSchema.default({}).describe('Model provider configuration'),
		mcpServers: ServerConfigsSchema.default({}).describe(
			'Tool servers the agent connects to for each agent-mode turn'
		),
		shutdown: ShutdownConfigSchema.default({}),
		terminal: TerminalConfigSchema.default({}),
	})
	.strict()
	.describe('Main configuration for the assistant, including its model and tool servers');

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
// Input type for user-facing API (pre-parsing) - makes fields with defaults optional
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;
