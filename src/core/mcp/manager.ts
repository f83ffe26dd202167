/**
 * ConnectionManager implementation for the Model Context Protocol (MCP) module.
 *
 * Owns every ToolServerHandle: connects them within a readiness deadline,
 * routes tool calls through them, and tears them down within a shutdown
 * deadline, forcibly terminating whatever does not stop in time.
 */

import { EventEmitter } from 'events';
import type { ZodError } from 'zod';

import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { McpServerConfigSchema, type McpServerConfig, type McpServerConfigInput } from './config.js';
import {
	CONNECTION_MODES,
	DEFAULT_SHUTDOWN_TIMEOUT_MS,
	ERROR_MESSAGES,
	LOG_PREFIXES,
} from './constants.js';
import { ToolServerHandle } from './connection/handle.js';
import { createSdkTransport } from './connection/transport.js';
import {
	AlreadyConnectedError,
	ConfigurationError,
	ConnectTimeoutError,
	LaunchFailureError,
	NotConnectedError,
	ShutdownTimeoutError,
	SideChannelFailureError,
	ToolServerError,
	ToolServerErrorUtils,
	TransportError,
} from './errors/index.js';
import { classifyCallResult } from './result.js';
import type {
	CloseAllEntry,
	CloseOutcome,
	ConnectAllResult,
	ExposedTool,
	InvokeOptions,
	StateChangeEvent,
	ToolInvocationFailure,
	ToolInvocationResult,
	TransportFactory,
} from './types.js';
import { DeadlineExceededError, delay, withDeadline } from './utils/index.js';

export interface ConnectionManagerOptions {
	/** Creates the transport for each connection; tests pass in-process fakes */
	transportFactory?: TransportFactory;
	logger?: Logger;
}

export interface ConnectAllOptions {
	/** Treat every server as strict, whatever its connectionMode */
	strict?: boolean;
}

type ConnectionManagerEvents = {
	stateChange: [StateChangeEvent];
};

const MAX_TOOL_NAME_LENGTH = 64;

export function sanitizeToolName(name: string): string {
	return name.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, MAX_TOOL_NAME_LENGTH);
}

export class ConnectionManager extends EventEmitter<ConnectionManagerEvents> {
	private readonly handles = new Map<string, ToolServerHandle>();
	private failedConnections: Record<string, string> = {};
	private readonly transportFactory: TransportFactory;
	protected logger: Logger;

	constructor(options: ConnectionManagerOptions = {}) {
		super();
		this.transportFactory = options.transportFactory ?? createSdkTransport;
		this.logger = options.logger ?? defaultLogger;
	}

	// ======================================================
	// Connect
	// ======================================================

	/**
	 * Start a server and wait until it has completed the handshake and listed
	 * its tools, all within the config's `timeoutMs`.
	 *
	 * @throws AlreadyConnectedError, ConnectTimeoutError, LaunchFailureError, ConfigurationError
	 */
	async connect(
		serverId: string,
		launchConfig: McpServerConfigInput | McpServerConfig
	): Promise<ToolServerHandle> {
		const existing = this.handles.get(serverId);
		if (existing && !existing.isTerminal()) {
			throw new AlreadyConnectedError(serverId, existing.state);
		}

		const config = this.parseConfig(serverId, launchConfig);
		const transport = this.transportFactory(serverId, config);
		const handle = new ToolServerHandle(serverId, config, transport, this.logger, event =>
			this.emit('stateChange', event)
		);

		this.handles.set(serverId, handle);
		delete this.failedConnections[serverId];
		handle.transition('connecting');

		this.logger.info(`${LOG_PREFIXES.CONNECT} Connecting to ${serverId} (${config.type})`, {
			serverId,
			transportType: config.type,
			timeoutMs: config.timeoutMs,
		});

		try {
			const tools = await withDeadline(
				async signal => {
					await transport.start(signal);
					return transport.listTools(signal);
				},
				config.timeoutMs,
				{ signal: handle.connectSignal, label: `Connecting to ${serverId}` }
			);

			if (handle.state !== 'connecting') {
				throw new LaunchFailureError('Connection was closed before it became ready', serverId, config.type);
			}

			handle.markConnected(tools);
			handle.track(transport.onClose(() => this.handleTransportClosed(handle)));

			this.logger.info(`${LOG_PREFIXES.CONNECT} Connected to ${serverId}`, {
				serverId,
				toolCount: tools.length,
			});
			return handle;
		} catch (error) {
			const failure = this.toConnectError(error, handle);

			// A close that arrived mid-connect owns the teardown
			if (handle.state === 'connecting') {
				handle.fail(failure);
				transport.terminate();
				this.removeHandle(handle);
			} else {
				handle.recordError(failure);
			}

			this.failedConnections[serverId] = failure.message;
			this.logger.error(`${LOG_PREFIXES.CONNECT} ${ERROR_MESSAGES.LAUNCH_FAILURE}: ${serverId}`, {
				serverId,
				kind: failure.kind,
				error: failure.message,
			});
			throw failure;
		}
	}

	/**
	 * Connect every enabled server concurrently. Lenient failures are logged and
	 * recorded; strict failures reject once every attempt has settled.
	 */
	async connectAll(
		serverConfigs: Record<string, McpServerConfigInput>,
		options: ConnectAllOptions = {}
	): Promise<ConnectAllResult> {
		const result: ConnectAllResult = { connected: [], failed: {}, skipped: [] };
		const strictServers = new Set<string>();
		const attempts: Array<Promise<void>> = [];

		for (const [serverId, input] of Object.entries(serverConfigs)) {
			let config: McpServerConfig;
			try {
				config = this.parseConfig(serverId, input);
			} catch (error) {
				const failure = this.toConnectError(error, undefined, serverId);
				result.failed[serverId] = failure;
				this.failedConnections[serverId] = failure.message;
				if (options.strict) strictServers.add(serverId);
				continue;
			}

			if (!config.enabled) {
				this.logger.info(`${LOG_PREFIXES.MANAGER} Skipping disabled server: ${serverId}`);
				result.skipped.push(serverId);
				continue;
			}

			const existing = this.handles.get(serverId);
			if (existing?.state === 'connected') {
				result.connected.push(serverId);
				continue;
			}

			if (options.strict || config.connectionMode === CONNECTION_MODES.STRICT) {
				strictServers.add(serverId);
			}

			attempts.push(
				this.connect(serverId, config).then(
					() => {
						result.connected.push(serverId);
					},
					(error: unknown) => {
						result.failed[serverId] = this.toConnectError(error, undefined, serverId);
					}
				)
			);
		}

		await Promise.all(attempts);

		const strictFailures = Object.keys(result.failed).filter(serverId => strictServers.has(serverId));
		if (strictFailures.length > 0) {
			const summary = ToolServerErrorUtils.summarizeErrors(
				strictFailures.flatMap(serverId => result.failed[serverId] ?? [])
			);
			const message = `${ERROR_MESSAGES.MISSING_REQUIRED_SERVERS}: ${strictFailures.join(', ')} (${summary})`;
			this.logger.error(`${LOG_PREFIXES.MANAGER} ${message}`);
			throw new ConfigurationError(message, strictFailures.join(','));
		}

		const failedIds = Object.keys(result.failed);
		if (failedIds.length > 0) {
			this.logger.warn(
				`${LOG_PREFIXES.MANAGER} Continuing without ${failedIds.length} server(s): ${failedIds.join(', ')}`
			);
		}

		return result;
	}

	// ======================================================
	// Invoke
	// ======================================================

	/**
	 * Forward a tool call. Never throws: every failure comes back as
	 * `{ ok: false, error }`, and a handle that is not connected is rejected
	 * before any transport I/O.
	 */
	async invoke(
		target: ToolServerHandle | string,
		toolName: string,
		args: Record<string, unknown> = {},
		options: InvokeOptions = {}
	): Promise<ToolInvocationResult> {
		const startedAt = Date.now();
		const handle = typeof target === 'string' ? this.handles.get(target) : target;
		const serverId = typeof target === 'string' ? target : target.serverId;

		if (!handle || handle.state !== 'connected') {
			return this.invocationFailure(
				serverId,
				toolName,
				new NotConnectedError(serverId, handle?.state ?? 'unknown'),
				startedAt
			);
		}

		const timeoutMs = options.timeoutMs ?? handle.config.callTimeoutMs;
		const cursor = handle.sideChannel.mark();
		handle.beginCall();

		this.logger.debug(`${LOG_PREFIXES.TOOL} Calling ${serverId}/${toolName}`, {
			serverId,
			toolName,
			timeoutMs,
		});

		try {
			const raw = await withDeadline(
				signal => handle.transport.callTool(toolName, args, { signal, timeoutMs }),
				timeoutMs,
				{ ...(options.signal ? { signal: options.signal } : {}), label: `Tool call '${toolName}'` }
			);
			await delay(handle.config.sideChannel.settleMs);

			const classified = classifyCallResult(raw, {
				serverId,
				toolName,
				sideChannelErrors: handle.sideChannel.errorsSince(cursor),
			});

			if (!classified.ok) {
				return this.invocationFailure(serverId, toolName, classified.error, startedAt, handle);
			}

			this.logger.debug(`${LOG_PREFIXES.TOOL} ${serverId}/${toolName} succeeded`, {
				serverId,
				toolName,
				isEmpty: classified.isEmpty,
				diagnostics: classified.diagnostics.length,
			});
			return { ...classified, serverId, toolName, durationMs: Date.now() - startedAt };
		} catch (error) {
			const lines = handle.sideChannel.errorsSince(cursor);
			let failure: ToolServerError;

			if (error instanceof DeadlineExceededError) {
				failure =
					lines.length > 0
						? new SideChannelFailureError(
								serverId,
								toolName,
								lines,
								`No response within ${timeoutMs}ms; the server reported: ${lines[lines.length - 1] ?? ''}`
							)
						: new TransportError(
								`${ERROR_MESSAGES.CALL_TIMEOUT}: '${toolName}' after ${timeoutMs}ms`,
								serverId,
								handle.transport.kind,
								{ timedOut: true, cause: error }
							);
			} else {
				failure = ToolServerErrorUtils.fromCallFailure(error, serverId, toolName, handle.transport.kind);
			}

			return this.invocationFailure(serverId, toolName, failure, startedAt, handle);
		} finally {
			handle.endCall();
		}
	}

	/**
	 * Aggregated tool catalogue across connected servers. Names are sanitised
	 * for the model provider; names offered by more than one server are
	 * prefixed with `<serverId>__`.
	 */
	listTools(): ExposedTool[] {
		const connected = [...this.handles.values()].filter(handle => handle.state === 'connected');
		const counts = new Map<string, number>();

		for (const handle of connected) {
			for (const tool of handle.tools) {
				const name = sanitizeToolName(tool.name);
				counts.set(name, (counts.get(name) ?? 0) + 1);
			}
		}

		return connected.flatMap(handle =>
			handle.tools.map(tool => {
				const name = sanitizeToolName(tool.name);
				const exposedName =
					(counts.get(name) ?? 0) > 1
						? sanitizeToolName(`${handle.serverId}__${tool.name}`)
						: name;
				return {
					exposedName,
					serverId: handle.serverId,
					toolName: tool.name,
					description: tool.description ?? '',
					inputSchema: tool.inputSchema,
				};
			})
		);
	}

	/**
	 * Invoke a tool by the name `listTools` exposes it under.
	 */
	async invokeTool(
		exposedName: string,
		args: Record<string, unknown> = {},
		options: InvokeOptions = {}
	): Promise<ToolInvocationResult> {
		const tool = this.listTools().find(candidate => candidate.exposedName === exposedName);
		if (!tool) {
			return this.invocationFailure(
				'unknown',
				exposedName,
				new NotConnectedError('unknown', 'unknown', `${ERROR_MESSAGES.UNKNOWN_TOOL} '${exposedName}'`),
				Date.now()
			);
		}
		return this.invoke(tool.serverId, tool.toolName, args, options);
	}

	// ======================================================
	// Close
	// ======================================================

	/**
	 * Shut a connection down within `timeoutMs`. A server that does not stop in
	 * time (or whose close fails) is terminated. Never throws; the handle ends
	 * `closed` and leaves the registry either way.
	 */
	async close(
		target: ToolServerHandle | string,
		timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS
	): Promise<CloseOutcome> {
		const handle = typeof target === 'string' ? this.handles.get(target) : target;

		if (!handle || handle.isTerminal()) {
			return { status: 'already-closed', durationMs: 0 };
		}
		if (handle.closing) {
			return handle.closing;
		}

		handle.closing = this.teardown(handle, timeoutMs);
		return handle.closing;
	}

	/**
	 * Close every registered connection concurrently. Each gets the time left
	 * until the overall deadline, so the call as a whole never exceeds `timeoutMs`.
	 */
	async closeAll(timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<CloseAllEntry[]> {
		const deadline = Date.now() + timeoutMs;
		const handles = [...this.handles.values()];

		if (handles.length > 0) {
			this.logger.info(`${LOG_PREFIXES.SHUTDOWN} Closing ${handles.length} connection(s)`, {
				timeoutMs,
			});
		}

		return Promise.all(
			handles.map(async handle => {
				const remaining = Math.max(0, deadline - Date.now());
				const outcome = handle.closing
					? await this.awaitPendingClose(handle, handle.closing, remaining)
					: await this.close(handle, remaining);
				return { serverId: handle.serverId, outcome };
			})
		);
	}

	// ======================================================
	// Registry
	// ======================================================

	getHandle(serverId: string): ToolServerHandle | undefined {
		return this.handles.get(serverId);
	}

	getHandles(): ToolServerHandle[] {
		return [...this.handles.values()];
	}

	getFailedConnections(): Record<string, string> {
		return { ...this.failedConnections };
	}

	// ======================================================
	// Private Methods
	// ======================================================

	private async teardown(handle: ToolServerHandle, timeoutMs: number): Promise<CloseOutcome> {
		const startedAt = Date.now();
		const { serverId } = handle;
		const wasConnecting = handle.state === 'connecting';

		handle.transition('closing');
		if (wasConnecting) {
			handle.abortConnect();
		}

		let outcome: CloseOutcome;
		try {
			await withDeadline(() => handle.transport.close(), timeoutMs, {
				label: `Closing ${serverId}`,
			});
			outcome = { status: 'graceful', durationMs: Date.now() - startedAt };
			this.logger.info(`${LOG_PREFIXES.SHUTDOWN} Closed ${serverId}`, {
				serverId,
				durationMs: outcome.durationMs,
			});
		} catch (error) {
			handle.transport.terminate();

			const shutdownError =
				error instanceof DeadlineExceededError
					? new ShutdownTimeoutError(serverId, timeoutMs, error)
					: error instanceof Error
						? error
						: new Error(String(error));
			if (shutdownError instanceof ToolServerError) {
				handle.recordError(shutdownError);
			}

			outcome = { status: 'forced', durationMs: Date.now() - startedAt, error: shutdownError };
			this.logger.warn(`${LOG_PREFIXES.SHUTDOWN} ${serverId}: ${shutdownError.message}`, {
				serverId,
				durationMs: outcome.durationMs,
			});
		}

		handle.transition('closed');
		this.removeHandle(handle);
		return outcome;
	}

	/**
	 * A close started earlier may have a longer budget than closeAll has left.
	 */
	private async awaitPendingClose(
		handle: ToolServerHandle,
		pending: Promise<CloseOutcome>,
		remaining: number
	): Promise<CloseOutcome> {
		const startedAt = Date.now();
		try {
			return await withDeadline(() => pending, remaining);
		} catch (error) {
			handle.transport.terminate();
			return {
				status: 'forced',
				durationMs: Date.now() - startedAt,
				error: new ShutdownTimeoutError(handle.serverId, remaining, error),
			};
		}
	}

	private handleTransportClosed(handle: ToolServerHandle): void {
		if (handle.state !== 'connected') {
			return;
		}

		const error = new TransportError('Connection closed by the server', handle.serverId, handle.transport.kind);
		handle.fail(error);
		handle.transport.terminate();
		this.removeHandle(handle);
		this.failedConnections[handle.serverId] = error.message;

		this.logger.error(`${LOG_PREFIXES.CONNECT} ${handle.serverId}: ${error.message}`, {
			serverId: handle.serverId,
			recentOutput: handle.sideChannel.recent(5).map(message => message.text),
		});
	}

	private invocationFailure(
		serverId: string,
		toolName: string,
		error: ToolServerError,
		startedAt: number,
		handle?: ToolServerHandle
	): ToolInvocationFailure {
		handle?.recordError(error);
		this.logger.warn(`${LOG_PREFIXES.TOOL} ${serverId}/${toolName} failed (${error.kind}): ${error.message}`, {
			serverId,
			toolName,
			kind: error.kind,
		});
		return { ok: false, serverId, toolName, error, durationMs: Date.now() - startedAt };
	}

	private removeHandle(handle: ToolServerHandle): void {
		if (this.handles.get(handle.serverId) === handle) {
			this.handles.delete(handle.serverId);
		}
	}

	private parseConfig(serverId: string, input: McpServerConfigInput | McpServerConfig): McpServerConfig {
		const parsed = McpServerConfigSchema.safeParse(input);
		if (!parsed.success) {
			throw new ConfigurationError(
				formatZodIssues(parsed.error),
				serverId,
				parsed.error.issues[0]?.path.join('.')
			);
		}
		return parsed.data;
	}

	private toConnectError(error: unknown, handle?: ToolServerHandle, fallbackId = ''): ToolServerError {
		const serverId = handle?.serverId ?? fallbackId;

		if (error instanceof ToolServerError) {
			return error;
		}
		if (error instanceof DeadlineExceededError) {
			return new ConnectTimeoutError(serverId, error.timeoutMs);
		}

		const transportType = handle?.config.type ?? 'stdio';
		if (handle?.connectSignal.aborted) {
			return new LaunchFailureError('Connection was closed before it became ready', serverId, transportType, error);
		}
		return new LaunchFailureError(ToolServerErrorUtils.messageOf(error), serverId, transportType, error);
	}
}

function formatZodIssues(error: ZodError): string {
	return error.issues
		.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
		.join('; ');
}
