import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type {
	CallOptions,
	SideChannelMessage,
	ToolServerTransport,
	TransportFactory,
	TransportKind,
	Unsubscribe,
} from '../types.js';

export type CallHandler = (
	name: string,
	args: Record<string, unknown>,
	options: CallOptions,
	transport: FakeTransport
) => Promise<unknown>;

export interface FakeTransportOptions {
	kind?: TransportKind;
	tools?: Tool[];
	hangOnStart?: boolean;
	startError?: Error;
	hangOnClose?: boolean;
	closeError?: Error;
	onCall?: CallHandler;
}

export function tool(name: string, description = `${name} tool`): Tool {
	return { name, description, inputSchema: { type: 'object', properties: {} } };
}

export function never<T>(): Promise<T> {
	return new Promise<T>(() => {});
}

/**
 * In-process stand-in for a tool server connection.
 */
export class FakeTransport implements ToolServerTransport {
	readonly kind: TransportKind;
	readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
	startCalls = 0;
	closeCalls = 0;
	terminateCalls = 0;

	private readonly diagnosticListeners = new Set<(message: SideChannelMessage) => void>();
	private readonly closeListeners = new Set<() => void>();

	constructor(private readonly options: FakeTransportOptions = {}) {
		this.kind = options.kind ?? 'stdio';
	}

	async start(_signal: AbortSignal): Promise<void> {
		this.startCalls++;
		if (this.options.hangOnStart) return never();
		if (this.options.startError) throw this.options.startError;
	}

	async listTools(_signal: AbortSignal): Promise<Tool[]> {
		return this.options.tools ?? [];
	}

	async callTool(name: string, args: Record<string, unknown>, options: CallOptions): Promise<unknown> {
		this.calls.push({ name, args });
		if (!this.options.onCall) {
			return { content: [{ type: 'text', text: `${name} done` }] };
		}
		return this.options.onCall(name, args, options, this);
	}

	async close(): Promise<void> {
		this.closeCalls++;
		if (this.options.hangOnClose) return never();
		if (this.options.closeError) throw this.options.closeError;
	}

	terminate(): void {
		this.terminateCalls++;
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
		return null;
	}

	emitStderr(text: string): void {
		this.emit({ source: 'stderr', level: 'info', text, timestamp: Date.now() });
	}

	emit(message: SideChannelMessage): void {
		for (const listener of this.diagnosticListeners) listener(message);
	}

	simulateClose(): void {
		for (const listener of this.closeListeners) listener();
	}
}

/**
 * Factory handing out one FakeTransport per server id, created on demand.
 */
export function fakeTransportFactory(options: Record<string, FakeTransportOptions> = {}): {
	factory: TransportFactory;
	transports: Map<string, FakeTransport>;
} {
	const transports = new Map<string, FakeTransport>();
	const factory: TransportFactory = (serverId, config) => {
		const transport = new FakeTransport({ kind: config.type, ...options[serverId] });
		transports.set(serverId, transport);
		return transport;
	};
	return { factory, transports };
}
