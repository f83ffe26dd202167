import { v4 as uuidv4 } from 'uuid';
import { logger as defaultLogger, type Logger } from '../logger/index.js';
import type { ConnectionManager } from '../mcp/manager.js';
import type { CloseAllEntry } from '../mcp/types.js';
import { AsyncLock } from '../mcp/utils/index.js';
import type { AgentConfig } from '../brain/agent/config.js';
import type { ChatMessage, CompletionClient } from '../brain/llm/services/types.js';
import { ReasoningAgent } from '../brain/reasoning/agent.js';
import type { AgentEvent } from '../brain/reasoning/events.js';
import { ExecShellRunner, type ShellRunner } from './shell.js';
import { AgentTranscript } from './transcript.js';

export const SESSION_MODES = ['chat', 'terminal', 'agent'] as const;
export type SessionMode = (typeof SESSION_MODES)[number];

export function isSessionMode(value: string): value is SessionMode {
	return SESSION_MODES.some(mode => mode === value);
}

/**
 * chat -> terminal -> agent -> chat
 */
export function nextMode(mode: SessionMode): SessionMode {
	const index = SESSION_MODES.indexOf(mode);
	return SESSION_MODES[(index + 1) % SESSION_MODES.length] ?? 'chat';
}

export type SessionEvent =
	| AgentEvent
	| { type: 'command_output'; command: string; output: string; exitCode: number | null; timedOut: boolean }
	| { type: 'connection'; connected: string[]; failed: Record<string, string>; skipped: string[] }
	| { type: 'shutdown'; outcomes: CloseAllEntry[] };

export interface ChatSessionOptions {
	client: CompletionClient;
	manager: ConnectionManager;
	config: Pick<AgentConfig, 'systemPrompt' | 'mcpServers' | 'shutdown' | 'terminal' | 'llm'>;
	/** Fail an agent turn when any server cannot connect */
	strict?: boolean;
	shell?: ShellRunner;
	logger?: Logger;
	mode?: SessionMode;
}

export interface RunOptions {
	signal?: AbortSignal;
}

/**
 * One conversation with the assistant. Turns are serialized; each turn runs in
 * the current mode and records what happened in the shared history.
 */
export class ChatSession {
	readonly id: string = uuidv4();

	private client: CompletionClient;
	private manager: ConnectionManager;
	private config: ChatSessionOptions['config'];
	private strict: boolean;
	private shell: ShellRunner;
	private logger: Logger;
	private messages: ChatMessage[];
	private mode: SessionMode;
	private lock = new AsyncLock();

	constructor(options: ChatSessionOptions) {
		this.client = options.client;
		this.manager = options.manager;
		this.config = options.config;
		this.strict = options.strict ?? false;
		this.shell = options.shell ?? new ExecShellRunner();
		this.logger = options.logger ?? defaultLogger;
		this.mode = options.mode ?? 'chat';
		this.messages = this.initialMessages();
		this.logger.debug(`[Session] Created session ${this.id} in ${this.mode} mode`);
	}

	getMode(): SessionMode {
		return this.mode;
	}

	setMode(mode: SessionMode): void {
		this.mode = mode;
	}

	cycleMode(): SessionMode {
		this.mode = nextMode(this.mode);
		return this.mode;
	}

	getMessages(): readonly ChatMessage[] {
		return this.messages;
	}

	clear(): void {
		this.messages = this.initialMessages();
	}

	/**
	 * Run one turn in the current mode. Failures do not throw: they are logged,
	 * yielded as an `error` event and recorded in the history.
	 */
	async *run(input: string, options: RunOptions = {}): AsyncGenerator<SessionEvent, void, undefined> {
		const text = input.trim();
		if (!text) {
			return;
		}

		await this.lock.acquire();
		try {
			switch (this.mode) {
				case 'chat':
					yield* this.runChat(text, options);
					break;
				case 'terminal':
					yield* this.runTerminal(text, options);
					break;
				case 'agent':
					yield* this.runAgent(text, options);
					break;
			}
		} finally {
			this.lock.release();
		}
	}

	private async *runChat(text: string, options: RunOptions): AsyncGenerator<SessionEvent> {
		this.messages.push({ role: 'user', content: text });
		let response = '';
		try {
			for await (const chunk of this.client.stream(this.messages, options)) {
				response += chunk;
				yield { type: 'text_chunk', content: chunk };
			}
			this.messages.push({ role: 'assistant', content: response });
		} catch (error) {
			yield this.recordError('chat', error);
		}
	}

	private async *runTerminal(command: string, options: RunOptions): AsyncGenerator<SessionEvent> {
		try {
			const result = await this.shell.run(command, {
				timeoutMs: this.config.terminal.timeoutMs,
				...(this.config.terminal.shell ? { shell: this.config.terminal.shell } : {}),
				...(options.signal ? { signal: options.signal } : {}),
			});
			const output = result.stdout || result.stderr;
			this.messages.push({
				role: 'user',
				content: `[PREVIOUS COMMAND]\n\n$ ${command}\n${output}`,
			});
			yield {
				type: 'command_output',
				command,
				output,
				exitCode: result.exitCode,
				timedOut: result.timedOut,
			};
		} catch (error) {
			yield this.recordError('terminal', error);
		}
	}

	/**
	 * Tool servers live only for the duration of one agent turn: they are
	 * connected at the start and always closed at the end, including when the
	 * turn fails or the consumer stops iterating.
	 */
	private async *runAgent(text: string, options: RunOptions): AsyncGenerator<SessionEvent> {
		const userMessage: ChatMessage = { role: 'user', content: text };
		const transcript = new AgentTranscript();
		let outcomes: CloseAllEntry[] | undefined;

		try {
			try {
				const connection = await this.manager.connectAll(this.config.mcpServers, {
					strict: this.strict,
				});
				yield {
					type: 'connection',
					connected: connection.connected,
					failed: Object.fromEntries(
						Object.entries(connection.failed).map(([serverId, error]) => [serverId, error.message])
					),
					skipped: connection.skipped,
				};

				const agent = new ReasoningAgent({
					client: this.client,
					tools: this.manager,
					maxIterations: this.config.llm.maxIterations,
					logger: this.logger,
				});

				for await (const event of agent.stream([...this.messages, userMessage], options)) {
					transcript.add(event);
					if (event.type === 'error') {
						this.logger.error(`[Session] Agent error: ${event.content}`);
					}
					yield event;
				}
				this.messages.push(userMessage, { role: 'assistant', content: transcript.toString() });
			} finally {
				outcomes = await this.shutdownServers();
			}
		} catch (error) {
			this.messages.push(userMessage);
			yield this.recordError('agent', error);
		}

		if (outcomes) {
			yield { type: 'shutdown', outcomes };
		}
	}

	private async shutdownServers(): Promise<CloseAllEntry[]> {
		const outcomes = await this.manager.closeAll(this.config.shutdown.timeoutMs);
		const forced = outcomes.filter(entry => entry.outcome.status === 'forced');
		if (forced.length > 0) {
			this.logger.warn(
				`[Session] Forced shutdown of ${forced.map(entry => entry.serverId).join(', ')}`
			);
		} else if (outcomes.length > 0) {
			this.logger.debug(`[Session] Closed ${outcomes.length} tool server(s)`);
		}
		return outcomes;
	}

	private recordError(mode: SessionMode, error: unknown): SessionEvent {
		const message = error instanceof Error ? error.message : String(error);
		this.logger.error(`[Session] Error in ${mode} mode: ${message}`);
		this.messages.push({ role: 'assistant', content: `Error: ${message}` });
		return { type: 'error', content: message };
	}

	private initialMessages(): ChatMessage[] {
		return [{ role: 'system', content: this.config.systemPrompt }];
	}
}
