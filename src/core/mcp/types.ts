/**
 * Core types for the tool server connection layer.
 *
 * A connection to one MCP tool server is represented by a ToolServerHandle,
 * owned by the ConnectionManager; the handle drives a ToolServerTransport,
 * which hides the MCP SDK client and the process, container or HTTP
 * connection underneath it.
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { McpServerConfig } from './config.js';
import type { ToolServerError } from './errors/connection-errors.js';

// ======================================================
// Transport and Connection Types
// ======================================================

export type TransportKind = McpServerConfig['type'];

/**
 * Lifecycle states of a connection. `closed` and `failed` are terminal.
 */
export type HandleState = 'disconnected' | 'connecting' | 'connected' | 'closing' | 'closed' | 'failed';

export type ContentBlock = CallToolResult['content'][number];

/**
 * Something the server said outside the tool-call response.
 */
export interface SideChannelMessage {
	source: 'stderr' | 'log-notification' | 'transport-error';
	level: 'info' | 'error';
	text: string;
	timestamp: number;
}

export type Unsubscribe = () => void;

export interface CallOptions {
	signal: AbortSignal;
	timeoutMs: number;
}

/**
 * The underlying connection to one tool server.
 *
 * `close` asks the server to stop and may hang; `terminate` must not:
 * it kills whatever process or container backs the connection and returns.
 */
export interface ToolServerTransport {
	readonly kind: TransportKind;

	/** Launch the server (if needed) and complete the MCP handshake. */
	start(signal: AbortSignal): Promise<void>;

	listTools(signal: AbortSignal): Promise<Tool[]>;

	/** Returns the raw result envelope exactly as the server sent it. */
	callTool(name: string, args: Record<string, unknown>, options: CallOptions): Promise<unknown>;

	close(): Promise<void>;

	terminate(): void;

	onDiagnostic(listener: (message: SideChannelMessage) => void): Unsubscribe;

	onClose(listener: () => void): Unsubscribe;

	/** Process id of the spawned server or runtime CLI, when there is one. */
	getPid(): number | null;
}

export type TransportFactory = (serverId: string, config: McpServerConfig) => ToolServerTransport;

// ======================================================
// Results
// ======================================================

/**
 * Detail carried by a RemoteError. Only the fields the failure produced are set.
 */
export interface RemoteErrorPayload {
	/** Content blocks of an `isError: true` result */
	content?: ContentBlock[];
	structuredContent?: Record<string, unknown>;
	/** JSON-RPC error code and data, for error responses */
	code?: number;
	data?: unknown;
	/** Error-level side-channel lines seen during the call */
	sideChannel?: string[];
}

export interface ToolInvocationSuccess {
	ok: true;
	serverId: string;
	toolName: string;
	content: ContentBlock[];
	structuredContent?: Record<string, unknown>;
	/** The tool ran and returned nothing. Distinct from a failure. */
	isEmpty: boolean;
	/** Error-level side-channel lines that accompanied a non-empty success */
	diagnostics: string[];
	durationMs: number;
}

export interface ToolInvocationFailure {
	ok: false;
	serverId: string;
	toolName: string;
	error: ToolServerError;
	durationMs: number;
}

export type ToolInvocationResult = ToolInvocationSuccess | ToolInvocationFailure;

export interface InvokeOptions {
	/** Overrides the server's callTimeoutMs */
	timeoutMs?: number;
	signal?: AbortSignal;
}

export interface CloseOutcome {
	status: 'graceful' | 'forced' | 'already-closed';
	durationMs: number;
	/** ShutdownTimeoutError or the error the graceful close raised */
	error?: ToolServerError | Error;
}

export interface CloseAllEntry {
	serverId: string;
	outcome: CloseOutcome;
}

export interface ConnectAllResult {
	connected: string[];
	failed: Record<string, ToolServerError>;
	skipped: string[];
}

/**
 * A tool as offered to the reasoning agent: the name it is exposed under,
 * and where calls to it are routed.
 */
export interface ExposedTool {
	exposedName: string;
	serverId: string;
	toolName: string;
	description: string;
	inputSchema: Tool['inputSchema'];
}

export interface StateChangeEvent {
	serverId: string;
	from: HandleState;
	to: HandleState;
	error?: ToolServerError;
}
