/**
 * SdkToolServerTransport - ToolServerTransport over the MCP SDK.
 *
 * Supports stdio, container (a stdio server run through the runtime CLI),
 * SSE and streamable HTTP servers. Stderr, log notifications and transport
 * errors are forwarded to diagnostic listeners.
 */

import { StringDecoder } from 'string_decoder';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
	CompatibilityCallToolResultSchema,
	LoggingMessageNotificationSchema,
	type LoggingLevel,
	type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { logger as defaultLogger, type Logger } from '../../logger/index.js';
import type { McpServerConfig } from '../config.js';
import { CLIENT_INFO, LOG_PREFIXES } from '../constants.js';
import type {
	CallOptions,
	SideChannelMessage,
	ToolServerTransport,
	TransportKind,
	Unsubscribe,
} from '../types.js';
import {
	buildContainerLaunch,
	createContainerName,
	removeContainer,
	stopContainer,
} from './container.js';

const ERROR_LOG_LEVELS: readonly LoggingLevel[] = ['error', 'critical', 'alert', 'emergency'];

export class SdkToolServerTransport implements ToolServerTransport {
	readonly kind: TransportKind;

	private client: Client | null = null;
	private transport: Transport | null = null;
	private pid: number | null = null;
	private containerName: string | null = null;
	private closed = false;
	private stderrRemainder = '';
	private stderrDecoder = new StringDecoder('utf8');
	private readonly diagnosticListeners = new Set<(message: SideChannelMessage) => void>();
	private readonly closeListeners = new Set<() => void>();

	constructor(
		private readonly serverId: string,
		private readonly config: McpServerConfig,
		private readonly logger: Logger = defaultLogger
	) {
		this.kind = config.type;
	}

	async start(signal: AbortSignal): Promise<void> {
		const transport = this.createTransport();
		this.transport = transport;

		const client = new Client(
			{ name: `${CLIENT_INFO.name}-${this.serverId}`, version: CLIENT_INFO.version },
			{ capabilities: {} }
		);
		client.onerror = error => {
			this.emitDiagnostic('transport-error', 'error', error.message);
		};
		client.onclose = () => this.handleClose();
		client.setNotificationHandler(LoggingMessageNotificationSchema, notification => {
			const { level, data } = notification.params;
			const text = typeof data === 'string' ? data : JSON.stringify(data);
			this.emitDiagnostic(
				'log-notification',
				ERROR_LOG_LEVELS.includes(level) ? 'error' : 'info',
				text
			);
		});
		this.client = client;

		await client.connect(transport, { signal, timeout: this.config.timeoutMs });

		if (transport instanceof StdioClientTransport) {
			this.pid = transport.pid;
		}
	}

	async listTools(signal: AbortSignal): Promise<Tool[]> {
		const client = this.requireClient();
		const tools: Tool[] = [];
		let cursor: string | undefined;

		do {
			const page = await client.listTools(cursor ? { cursor } : undefined, {
				signal,
				timeout: this.config.timeoutMs,
			});
			tools.push(...page.tools);
			cursor = page.nextCursor;
		} while (cursor);

		return tools;
	}

	async callTool(name: string, args: Record<string, unknown>, options: CallOptions): Promise<unknown> {
		const client = this.requireClient();
		return client.callTool({ name, arguments: args }, CompatibilityCallToolResultSchema, {
			signal: options.signal,
			timeout: options.timeoutMs,
		});
	}

	async close(): Promise<void> {
		const client = this.client;
		if (client) {
			await client.close();
		} else if (this.transport) {
			await this.transport.close();
		}

		if (this.config.type === 'container' && this.containerName) {
			await stopContainer(this.config.runtime, this.containerName);
		}
	}

	terminate(): void {
		if (this.pid !== null) {
			try {
				process.kill(this.pid, 'SIGKILL');
			} catch (error) {
				// ESRCH: already exited
				this.logger.debug(
					`${LOG_PREFIXES.SHUTDOWN} Could not kill pid ${this.pid} for ${this.serverId}: ${error instanceof Error ? error.message : String(error)}`
				);
			}
		}

		if (this.config.type === 'container' && this.containerName) {
			removeContainer(this.config.runtime, this.containerName, this.logger);
		}

		const client = this.client;
		if (client) {
			client.close().catch((error: unknown) => {
				this.logger.debug(
					`${LOG_PREFIXES.SHUTDOWN} Client close after terminate failed for ${this.serverId}: ${error instanceof Error ? error.message : String(error)}`
				);
			});
		}
	}

	onDiagnostic(listener: (message: SideChannelMessage) => void): Unsubscribe {
		this.diagnosticListeners.add(listener);
		return () => this.diagnosticListeners.delete(listener);
	}

	onClose(listener: () => void): Unsubscribe {
		this.closeListeners.add(listener);
		return () => this.closeListeners.delete(listener);
	}

	getPid(): number | null {
		return this.pid;
	}

	getContainerName(): string | null {
		return this.containerName;
	}

	// ======================================================
	// Private Methods
	// ======================================================

	private createTransport(): Transport {
		const config = this.config;

		switch (config.type) {
			case 'stdio': {
				this.logger.debug(`${LOG_PREFIXES.CONNECT} Creating stdio transport`, {
					serverId: this.serverId,
					command: config.command,
					args: config.args,
				});
				return this.createStdioTransport(config.command, config.args, config.env, config.cwd);
			}

			case 'container': {
				const launch = buildContainerLaunch(config, createContainerName(this.serverId));
				this.containerName = launch.containerName;
				this.logger.debug(`${LOG_PREFIXES.CONNECT} Creating container transport`, {
					serverId: this.serverId,
					command: launch.command,
					args: launch.args,
				});
				return this.createStdioTransport(launch.command, launch.args, config.env);
			}

			case 'sse':
				return new SSEClientTransport(new URL(config.url), {
					requestInit: { headers: config.headers },
				});

			case 'streamable-http':
				return new StreamableHTTPClientTransport(new URL(config.url), {
					requestInit: { headers: config.headers },
				});
		}
	}

	private createStdioTransport(
		command: string,
		args: string[],
		env: Record<string, string>,
		cwd?: string
	): StdioClientTransport {
		const transport = new StdioClientTransport({
			command,
			args,
			env: mergeEnvironment(env),
			stderr: 'pipe',
			...(cwd ? { cwd } : {}),
		});

		// A chunk can end inside a multi-byte character
		transport.stderr?.on('data', (data: Buffer | string) =>
			this.handleStderr(typeof data === 'string' ? data : this.stderrDecoder.write(data))
		);
		return transport;
	}

	private handleStderr(chunk: string): void {
		const lines = (this.stderrRemainder + chunk).split(/\r?\n/);
		this.stderrRemainder = lines.pop() ?? '';
		for (const line of lines) {
			if (line.trim()) {
				this.emitDiagnostic('stderr', 'info', line);
			}
		}
	}

	private handleClose(): void {
		if (this.closed) return;
		this.closed = true;

		this.stderrRemainder += this.stderrDecoder.end();
		if (this.stderrRemainder.trim()) {
			this.emitDiagnostic('stderr', 'info', this.stderrRemainder);
			this.stderrRemainder = '';
		}
		for (const listener of this.closeListeners) {
			listener();
		}
	}

	private emitDiagnostic(source: SideChannelMessage['source'], level: SideChannelMessage['level'], text: string): void {
		const message: SideChannelMessage = { source, level, text, timestamp: Date.now() };
		for (const listener of this.diagnosticListeners) {
			listener(message);
		}
	}

	private requireClient(): Client {
		if (!this.client) {
			throw new Error(`Transport for ${this.serverId} has not been started`);
		}
		return this.client;
	}
}

/**
 * Server processes inherit the full environment, with the configured values on top.
 */
export function mergeEnvironment(configEnv: Record<string, string>): Record<string, string> {
	const processEnv: Record<string, string> = {};
	for (const [key, value] of Object.entries(process.env)) {
		if (value !== undefined) {
			processEnv[key] = value;
		}
	}

	return { ...processEnv, ...configEnv };
}

export function createSdkTransport(serverId: string, config: McpServerConfig): ToolServerTransport {
	return new SdkToolServerTransport(serverId, config);
}
