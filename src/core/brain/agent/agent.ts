import { env } from '../../env.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';
import { ConnectionManager } from '../../mcp/manager.js';
import type { CloseAllEntry } from '../../mcp/types.js';
import { ChatSession, type SessionMode } from '../../session/chat-session.js';
import type { ShellRunner } from '../../session/shell.js';
import { createOpenAIService } from '../llm/services/openai.js';
import type { CompletionClient } from '../llm/services/types.js';
import type { AgentConfig } from './config.js';

export interface AssistantOptions {
	/** Defaults to an OpenAI client built from `config.llm` */
	client?: CompletionClient;
	manager?: ConnectionManager;
	shell?: ShellRunner;
	logger?: Logger;
	strict?: boolean;
	/** Overrides `config.shutdown.timeoutMs` */
	shutdownTimeoutMs?: number;
	mode?: SessionMode;
}

/**
 * Owns the model client, the connection manager and the chat session for one
 * run of the CLI.
 */
export class Assistant {
	public readonly manager: ConnectionManager;
	public readonly client: CompletionClient;
	public readonly session: ChatSession;

	private config: AgentConfig;
	private logger: Logger;
	private isStarted = false;
	private isStopped = false;

	constructor(config: AgentConfig, options: AssistantOptions = {}) {
		this.logger = options.logger ?? defaultLogger;
		this.config =
			options.shutdownTimeoutMs !== undefined
				? { ...config, shutdown: { timeoutMs: options.shutdownTimeoutMs } }
				: config;
		this.manager = options.manager ?? new ConnectionManager({ logger: this.logger });
		this.client = options.client ?? createOpenAIService(this.config.llm, env.OPENAI_API_KEY);
		this.session = new ChatSession({
			client: this.client,
			manager: this.manager,
			config: this.config,
			logger: this.logger,
			...(options.strict !== undefined ? { strict: options.strict } : {}),
			...(options.shell ? { shell: options.shell } : {}),
			...(options.mode ? { mode: options.mode } : {}),
		});
	}

	start(): void {
		if (this.isStarted) {
			throw new Error('Assistant is already started');
		}
		const { model, chatModel } = this.client.getConfig();
		this.logger.debug(
			`Assistant started (agent model: ${model}, chat model: ${chatModel}, servers: ${Object.keys(this.config.mcpServers).join(', ') || 'none'})`
		);
		this.isStarted = true;
	}

	/**
	 * Close any tool server still registered. Safe to call more than once.
	 */
	async stop(): Promise<CloseAllEntry[]> {
		if (this.isStopped) {
			this.logger.warn('Assistant is already stopped');
			return [];
		}
		this.isStopped = true;
		this.isStarted = false;

		const outcomes = await this.manager.closeAll(this.config.shutdown.timeoutMs);
		const failed = outcomes.filter(entry => entry.outcome.status === 'forced');
		if (failed.length > 0) {
			this.logger.warn(
				`Assistant stopped; forced shutdown of ${failed.map(entry => entry.serverId).join(', ')}`
			);
		} else {
			this.logger.debug('Assistant stopped');
		}
		return outcomes;
	}

	getConfig(): AgentConfig {
		return this.config;
	}

	getIsStarted(): boolean {
		return this.isStarted;
	}

	getIsStopped(): boolean {
		return this.isStopped;
	}
}
