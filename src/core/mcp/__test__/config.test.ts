import { describe, it, expect, afterEach, vi } from 'vitest';
import { McpServerConfigSchema, ServerConfigsSchema, parseServerConfig } from '../config.js';
import {
	DEFAULT_CALL_TIMEOUT_MS,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_FAILURE_PATTERN,
} from '../constants.js';

describe('MCP server configuration', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('should apply defaults to a stdio server', () => {
		expect(parseServerConfig({ type: 'stdio', command: 'uv', args: ['run', 'condamcp'] })).toEqual({
			type: 'stdio',
			command: 'uv',
			args: ['run', 'condamcp'],
			env: {},
			enabled: true,
			timeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
			callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS,
			connectionMode: 'lenient',
			sideChannel: { enabled: true, failurePattern: DEFAULT_FAILURE_PATTERN, settleMs: 0 },
		});
	});

	it('should apply container defaults', () => {
		const config = parseServerConfig({ type: 'container', image: 'datalayer/jupyter-mcp-server:latest' });

		expect(config).toMatchObject({ runtime: 'docker', runArgs: [], args: [], env: {} });
	});

	it('should take the connect timeout from MCP_GLOBAL_TIMEOUT when set', () => {
		vi.stubEnv('MCP_GLOBAL_TIMEOUT', '45000');

		expect(parseServerConfig({ type: 'stdio', command: 'uv' }).timeoutMs).toBe(45000);
	});

	it('should prefer an explicit timeout over the environment', () => {
		vi.stubEnv('MCP_GLOBAL_TIMEOUT', '45000');

		expect(parseServerConfig({ type: 'stdio', command: 'uv', timeoutMs: 5000 }).timeoutMs).toBe(5000);
	});

	it('should reject an unknown server type with a readable message', () => {
		const result = McpServerConfigSchema.safeParse({ type: 'websocket', url: 'ws://localhost' });

		expect(result.success).toBe(false);
		expect(result.error?.issues[0]?.message).toBe(
			"Invalid server type. Expected 'stdio', 'container', 'sse', or 'streamable-http'."
		);
	});

	it('should reject unknown fields', () => {
		const result = McpServerConfigSchema.safeParse({ type: 'stdio', command: 'uv', comand: 'typo' });

		expect(result.success).toBe(false);
	});

	it('should reject an invalid failure pattern', () => {
		const result = McpServerConfigSchema.safeParse({
			type: 'stdio',
			command: 'uv',
			sideChannel: { failurePattern: '(' },
		});

		expect(result.success).toBe(false);
		expect(result.error?.issues[0]?.message).toBe('failurePattern must be a valid regular expression');
	});

	it('should require a valid url for remote servers', () => {
		expect(McpServerConfigSchema.safeParse({ type: 'sse', url: 'not a url' }).success).toBe(false);
		expect(
			McpServerConfigSchema.safeParse({ type: 'streamable-http', url: 'http://localhost:4000/mcp' })
				.success
		).toBe(true);
	});

	it('should parse a named collection of servers', () => {
		const configs = ServerConfigsSchema.parse({
			jupyter: { type: 'container', image: 'datalayer/jupyter-mcp-server:latest' },
			conda: { type: 'stdio', command: 'uv', args: ['run', 'condamcp'] },
		});

		expect(Object.keys(configs)).toEqual(['jupyter', 'conda']);
		expect(configs.conda?.type).toBe('stdio');
	});
});
