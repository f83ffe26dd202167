/**
 * Constants for the tool server connection layer.
 */

// ======================================================
// Connection and Timeout Constants
// ======================================================

/**
 * Default time a server gets to start, complete the MCP handshake and list its tools.
 */
export const DEFAULT_CONNECT_TIMEOUT_MS = 30000; // 30 seconds

/**
 * Default time a single tool call may take.
 */
export const DEFAULT_CALL_TIMEOUT_MS = 60000; // 1 minute

/**
 * Default graceful shutdown budget for one connection, or for closeAll as a whole.
 */
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10000; // 10 seconds

/**
 * Stderr lines matching this pattern are treated as error reports from the server.
 */
export const DEFAULT_FAILURE_PATTERN = String.raw`Traceback|Exception|\bERROR\b|Error:`;

/**
 * Number of side-channel lines kept per connection for diagnostics.
 */
export const SIDE_CHANNEL_BUFFER_SIZE = 200;

/**
 * Client identity announced during the MCP initialize handshake.
 */
export const CLIENT_INFO = {
	name: 'nbconda',
	version: '0.1.0',
} as const;

// ======================================================
// Connection Modes
// ======================================================

export const CONNECTION_MODES = {
	/**
	 * Strict mode requires the server to successfully connect.
	 */
	STRICT: 'strict',
} as const;

// ======================================================
// Error Messages
// ======================================================

export const ERROR_MESSAGES = {
	LAUNCH_FAILURE: 'Failed to launch MCP server',
	UNKNOWN_TOOL: 'No connected server provides tool',
	REMOTE_ERROR: 'Tool call failed on the server',
	SIDE_CHANNEL_FAILURE: 'Server reported a failure outside the tool response',
	CALL_TIMEOUT: 'Tool call timed out',
	MISSING_REQUIRED_SERVERS: 'Failed to connect to required strict servers',
};

// ======================================================
// Logging Constants
// ======================================================

export const LOG_PREFIXES = {
	CONNECT: 'MCP Connection:',
	TOOL: 'MCP Tool:',
	SHUTDOWN: 'MCP Shutdown:',
	MANAGER: 'MCP Manager:',
	SIDE_CHANNEL: 'MCP Side Channel:',
};
