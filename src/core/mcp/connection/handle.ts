/**
 * ToolServerHandle - one connection to one tool server.
 *
 * The handle owns the state machine; the ConnectionManager is the only caller
 * of the mutating methods.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from '../../logger/index.js';
import type { McpServerConfig } from '../config.js';
import { InvalidStateTransitionError, type ToolServerError } from '../errors/index.js';
import type {
	CloseOutcome,
	HandleState,
	StateChangeEvent,
	ToolServerTransport,
	Unsubscribe,
} from '../types.js';
import { SideChannelMonitor } from './side-channel.js';

/**
 * Allowed transitions. States only move forward; `closed` and `failed` are terminal.
 */
export const HANDLE_TRANSITIONS: Readonly<Record<HandleState, readonly HandleState[]>> = {
	disconnected: ['connecting', 'closing'],
	connecting: ['connected', 'closing', 'failed'],
	connected: ['closing', 'failed'],
	closing: ['closed', 'failed'],
	closed: [],
	failed: [],
};

export function isTerminalState(state: HandleState): boolean {
	return HANDLE_TRANSITIONS[state].length === 0;
}

export class ToolServerHandle {
	readonly serverId: string;
	readonly config: McpServerConfig;
	readonly transport: ToolServerTransport;
	readonly sideChannel: SideChannelMonitor;

	private _state: HandleState = 'disconnected';
	private _lastError: ToolServerError | undefined;
	private _tools: Tool[] = [];
	private _inFlight = 0;
	private _connectedAt: Date | undefined;
	private _closedAt: Date | undefined;
	private readonly connectController = new AbortController();
	private readonly unsubscribers: Unsubscribe[] = [];

	/** Shared teardown; set by the first close and awaited by the rest */
	closing: Promise<CloseOutcome> | null = null;

	constructor(
		serverId: string,
		config: McpServerConfig,
		transport: ToolServerTransport,
		logger: Logger,
		private readonly onStateChange: (event: StateChangeEvent) => void = () => {}
	) {
		this.serverId = serverId;
		this.config = config;
		this.transport = transport;
		this.sideChannel = new SideChannelMonitor(serverId, config.sideChannel, logger);
		this.unsubscribers.push(transport.onDiagnostic(message => this.sideChannel.record(message)));
	}

	get state(): HandleState {
		return this._state;
	}

	get lastError(): ToolServerError | undefined {
		return this._lastError;
	}

	get tools(): readonly Tool[] {
		return this._tools;
	}

	get inFlight(): number {
		return this._inFlight;
	}

	get connectedAt(): Date | undefined {
		return this._connectedAt;
	}

	get closedAt(): Date | undefined {
		return this._closedAt;
	}

	/** Aborted when a close arrives while the connect is still pending */
	get connectSignal(): AbortSignal {
		return this.connectController.signal;
	}

	isTerminal(): boolean {
		return isTerminalState(this._state);
	}

	canTransition(to: HandleState): boolean {
		return HANDLE_TRANSITIONS[this._state].includes(to);
	}

	/**
	 * @throws InvalidStateTransitionError when `to` is not reachable from the current state
	 */
	transition(to: HandleState, error?: ToolServerError): void {
		const from = this._state;
		if (!this.canTransition(to)) {
			throw new InvalidStateTransitionError(this.serverId, from, to);
		}

		this._state = to;
		if (error) {
			this._lastError = error;
		}
		if (to === 'connected') {
			this._connectedAt = new Date();
		}
		if (isTerminalState(to)) {
			this._closedAt = new Date();
			this.detach();
		}

		this.onStateChange({ serverId: this.serverId, from, to, ...(error ? { error } : {}) });
	}

	markConnected(tools: Tool[]): void {
		this._tools = tools;
		this.transition('connected');
	}

	fail(error: ToolServerError): void {
		this.transition('failed', error);
	}

	recordError(error: ToolServerError): void {
		this._lastError = error;
	}

	abortConnect(): void {
		this.connectController.abort();
	}

	beginCall(): void {
		this._inFlight++;
	}

	endCall(): void {
		this._inFlight = Math.max(0, this._inFlight - 1);
	}

	/** Track a transport subscription so it is dropped when the handle reaches a terminal state */
	track(unsubscribe: Unsubscribe): void {
		if (this.isTerminal()) {
			unsubscribe();
			return;
		}
		this.unsubscribers.push(unsubscribe);
	}

	private detach(): void {
		for (const unsubscribe of this.unsubscribers.splice(0)) {
			unsubscribe();
		}
	}
}
