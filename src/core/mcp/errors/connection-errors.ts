/**
 * Tool Server Errors
 *
 * One class per failure kind the connection manager can report. `connect`
 * rejects with them, `invoke` returns them inside its result, and the shutdown
 * path records them on the handle without throwing.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { HandleState, RemoteErrorPayload, TransportKind } from '../types.js';

export type ToolServerErrorKind =
	| 'AlreadyConnected'
	| 'ConnectTimeout'
	| 'LaunchFailure'
	| 'NotConnected'
	| 'RemoteError'
	| 'SideChannelFailure'
	| 'TransportError'
	| 'ShutdownTimeout'
	| 'InvalidStateTransition'
	| 'Configuration';

/**
 * Base class for all tool server errors
 */
export abstract class ToolServerError extends Error {
	public readonly serverId: string;
	public readonly kind: ToolServerErrorKind;
	public readonly recoverable: boolean;
	public readonly timestamp: Date;

	constructor(
		message: string,
		serverId: string,
		kind: ToolServerErrorKind,
		recoverable = true,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = this.constructor.name;
		this.serverId = serverId;
		this.kind = kind;
		this.recoverable = recoverable;
		this.timestamp = new Date();

		// Ensure the prototype chain is correct
		Object.setPrototypeOf(this, new.target.prototype);
	}

	/**
	 * Convert error to a serializable object
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			kind: this.kind,
			message: this.message,
			serverId: this.serverId,
			recoverable: this.recoverable,
			timestamp: this.timestamp.toISOString(),
		};
	}

	/**
	 * Get a user-friendly error description
	 */
	getUserFriendlyMessage(): string {
		return `Server '${this.serverId}': ${this.message}`;
	}
}

export class AlreadyConnectedError extends ToolServerError {
	public readonly state: HandleState;

	constructor(serverId: string, state: HandleState) {
		super(`Server '${serverId}' already has a ${state} connection`, serverId, 'AlreadyConnected', false);
		this.state = state;
	}

	getUserFriendlyMessage(): string {
		return `Server '${this.serverId}' is already ${this.state}; close it before connecting again`;
	}
}

export class ConnectTimeoutError extends ToolServerError {
	public readonly timeoutMs: number;

	constructor(serverId: string, timeoutMs: number) {
		super(`Server did not become ready within ${timeoutMs}ms`, serverId, 'ConnectTimeout');
		this.timeoutMs = timeoutMs;
	}

	getUserFriendlyMessage(): string {
		return `Connection to server '${this.serverId}' timed out after ${this.timeoutMs}ms`;
	}
}

export class LaunchFailureError extends ToolServerError {
	public readonly transportType: TransportKind;

	constructor(message: string, serverId: string, transportType: TransportKind, cause?: unknown) {
		super(message, serverId, 'LaunchFailure', true, { cause });
		this.transportType = transportType;
	}

	getUserFriendlyMessage(): string {
		return `Failed to launch ${this.transportType} server '${this.serverId}': ${this.message}`;
	}
}

export class NotConnectedError extends ToolServerError {
	public readonly state: HandleState | 'unknown';

	constructor(serverId: string, state: HandleState | 'unknown', message?: string) {
		super(
			message ?? `Server '${serverId}' is not connected (state: ${state})`,
			serverId,
			'NotConnected',
			false
		);
		this.state = state;
	}
}

/**
 * The server answered, and the answer says the call failed.
 */
export class RemoteError extends ToolServerError {
	public readonly toolName: string;
	public readonly payload: RemoteErrorPayload;

	constructor(
		message: string,
		serverId: string,
		toolName: string,
		payload: RemoteErrorPayload,
		kind: 'RemoteError' | 'SideChannelFailure' = 'RemoteError'
	) {
		super(message, serverId, kind, true);
		this.toolName = toolName;
		this.payload = payload;
	}

	toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), toolName: this.toolName, payload: this.payload };
	}

	getUserFriendlyMessage(): string {
		return `Tool '${this.toolName}' on server '${this.serverId}' failed: ${this.message}`;
	}
}

/**
 * The server reported the failure out of band (stderr, log notifications)
 * while the expected response was missing or empty.
 */
export class SideChannelFailureError extends RemoteError {
	constructor(serverId: string, toolName: string, lines: string[], detail: string) {
		super(detail, serverId, toolName, { sideChannel: lines }, 'SideChannelFailure');
	}

	getUserFriendlyMessage(): string {
		const lines = this.payload.sideChannel ?? [];
		const preview = lines.slice(-5).join('\n');
		return `Tool '${this.toolName}' on server '${this.serverId}' failed (reported outside the response): ${this.message}${preview ? `\n${preview}` : ''}`;
	}
}

export class TransportError extends ToolServerError {
	public readonly transportType: TransportKind;
	public readonly timedOut: boolean;

	constructor(
		message: string,
		serverId: string,
		transportType: TransportKind,
		options: { timedOut?: boolean; cause?: unknown } = {}
	) {
		super(message, serverId, 'TransportError', true, { cause: options.cause });
		this.transportType = transportType;
		this.timedOut = options.timedOut ?? false;
	}

	toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), transportType: this.transportType, timedOut: this.timedOut };
	}

	getUserFriendlyMessage(): string {
		return `${this.transportType.toUpperCase()} transport error for server '${this.serverId}': ${this.message}`;
	}
}

export class ShutdownTimeoutError extends ToolServerError {
	public readonly timeoutMs: number;

	constructor(serverId: string, timeoutMs: number, cause?: unknown) {
		super(
			`Server did not shut down within ${timeoutMs}ms and was terminated`,
			serverId,
			'ShutdownTimeout',
			false,
			{ cause }
		);
		this.timeoutMs = timeoutMs;
	}
}

export class InvalidStateTransitionError extends ToolServerError {
	public readonly from: HandleState;
	public readonly to: HandleState;

	constructor(serverId: string, from: HandleState, to: HandleState) {
		super(`Illegal state transition ${from} -> ${to}`, serverId, 'InvalidStateTransition', false);
		this.from = from;
		this.to = to;
	}
}

export class ConfigurationError extends ToolServerError {
	public readonly configField: string | undefined;

	constructor(message: string, serverId: string, configField?: string) {
		super(message, serverId, 'Configuration', false); // Config errors are not recoverable
		this.configField = configField;
	}

	getUserFriendlyMessage(): string {
		const fieldText = this.configField ? ` in field '${this.configField}'` : '';
		return `Configuration error for server '${this.serverId}'${fieldText}: ${this.message}`;
	}
}

/**
 * Utility functions for working with tool server errors
 */
export class ToolServerErrorUtils {
	static messageOf(error: unknown): string {
		return error instanceof Error ? error.message : String(error);
	}

	/**
	 * Classify an exception thrown while a tool call was in flight.
	 * A JSON-RPC error response is the server speaking, so it is a RemoteError;
	 * a closed connection or an SDK request timeout is a TransportError.
	 */
	static fromCallFailure(
		error: unknown,
		serverId: string,
		toolName: string,
		transportType: TransportKind
	): ToolServerError {
		if (error instanceof ToolServerError) {
			return error;
		}

		if (error instanceof McpError) {
			if (error.code === ErrorCode.ConnectionClosed) {
				return new TransportError(error.message, serverId, transportType, { cause: error });
			}
			if (error.code === ErrorCode.RequestTimeout) {
				return new TransportError(error.message, serverId, transportType, {
					timedOut: true,
					cause: error,
				});
			}
			return new RemoteError(error.message, serverId, toolName, {
				code: error.code,
				data: error.data,
			});
		}

		return new TransportError(ToolServerErrorUtils.messageOf(error), serverId, transportType, {
			cause: error,
		});
	}

	/**
	 * Create a summary of multiple errors, grouped by kind
	 */
	static summarizeErrors(errors: ToolServerError[]): string {
		const serversByKind = new Map<string, string[]>();

		for (const error of errors) {
			const servers = serversByKind.get(error.kind) ?? [];
			servers.push(error.serverId);
			serversByKind.set(error.kind, servers);
		}

		return Array.from(serversByKind, ([kind, servers]) => `${kind}: ${servers.join(', ')}`).join('; ');
	}
}
