import { z } from 'zod';
import { env } from '../env.js';
import { numberFromString } from '../utils/schema.js';
import {
	DEFAULT_CALL_TIMEOUT_MS,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_FAILURE_PATTERN,
} from './constants.js';

/**
 * Side-channel monitoring: how the manager recognises failures a server reports
 * outside the tool-call response (stderr, log notifications, transport errors).
 */
export const SideChannelConfigSchema = z
	.object({
		enabled: z.boolean().default(true).describe('Whether to watch the side channel at all'),
		failurePattern: z
			.string()
			.default(DEFAULT_FAILURE_PATTERN)
			.refine(
				pattern => {
					try {
						new RegExp(pattern);
						return true;
					} catch {
						return false;
					}
				},
				{ message: 'failurePattern must be a valid regular expression' }
			)
			.describe('Regular expression that marks a stderr line as an error report'),
		settleMs: numberFromString(z.number().int().nonnegative())
			.default(0)
			.describe('Extra time to wait after a response for late side-channel output'),
	})
	.strict();

const commonFields = {
	enabled: z
		.boolean()
		.default(true)
		.describe(
			'Whether this server is enabled. Disabled servers will be skipped during initialization'
		),
	timeoutMs: numberFromString(z.number().int().positive())
		.default(() => env.MCP_GLOBAL_TIMEOUT ?? DEFAULT_CONNECT_TIMEOUT_MS)
		.describe(
			'Maximum time in milliseconds to wait for the server to become ready (MCP_GLOBAL_TIMEOUT when unset)'
		),
	callTimeoutMs: numberFromString(z.number().int().positive())
		.default(DEFAULT_CALL_TIMEOUT_MS)
		.describe('Maximum time in milliseconds to wait for a single tool call'),
	connectionMode: z
		.enum(['strict', 'lenient'])
		.default('lenient')
		.describe(
			'How to handle connection failures: "strict" fails the turn, "lenient" continues with warnings'
		),
	sideChannel: SideChannelConfigSchema.default({}),
};

export const StdioServerConfigSchema = z
	.object({
		type: z.literal('stdio'),
		command: z
			.string()
			.min(1)
			.describe("Command to launch the MCP server (e.g., 'uv', 'node', 'uvx')"),
		args: z.array(z.string()).default([]).describe('Arguments to pass to the command'),
		env: z
			.record(z.string())
			.default({})
			.describe('Environment variables to set for the server process'),
		cwd: z.string().optional().describe('Working directory for the server process'),
		...commonFields,
	})
	.strict();
export type StdioServerConfig = z.infer<typeof StdioServerConfigSchema>;

export const ContainerServerConfigSchema = z
	.object({
		type: z.literal('container'),
		image: z
			.string()
			.min(1)
			.describe('Container image running the MCP server (e.g., "datalayer/jupyter-mcp-server:latest")'),
		runtime: z
			.string()
			.min(1)
			.default('docker')
			.describe('Container runtime CLI used to run and remove the container'),
		runArgs: z
			.array(z.string())
			.default([])
			.describe('Extra arguments for "<runtime> run", placed before the image'),
		args: z.array(z.string()).default([]).describe('Arguments passed to the image entrypoint'),
		env: z
			.record(z.string())
			.default({})
			.describe('Environment forwarded into the container with "-e NAME"'),
		...commonFields,
	})
	.strict();
export type ContainerServerConfig = z.infer<typeof ContainerServerConfigSchema>;

export const SseServerConfigSchema = z
	.object({
		type: z.literal('sse'),
		url: z.string().url().describe('Complete URL of the Server-Sent Events endpoint'),
		headers: z
			.record(z.string())
			.default({})
			.describe('HTTP headers for authentication or configuration'),
		...commonFields,
	})
	.strict();
export type SseServerConfig = z.infer<typeof SseServerConfigSchema>;

export const StreamableHttpServerConfigSchema = z
	.object({
		type: z.literal('streamable-http'),
		url: z.string().url().describe('Base URL of the streamable HTTP MCP server'),
		headers: z
			.record(z.string())
			.default({})
			.describe('HTTP headers sent with every request'),
		...commonFields,
	})
	.strict();
export type StreamableHttpServerConfig = z.infer<typeof StreamableHttpServerConfigSchema>;

export const McpServerConfigSchema = z
	.discriminatedUnion(
		'type',
		[
			StdioServerConfigSchema,
			ContainerServerConfigSchema,
			SseServerConfigSchema,
			StreamableHttpServerConfigSchema,
		],
		{
			errorMap: (issue, ctx) => {
				if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
					return {
						message: `Invalid server type. Expected 'stdio', 'container', 'sse', or 'streamable-http'.`,
					};
				}
				return { message: ctx.defaultError };
			},
		}
	)
	.describe(
		'MCP server launch configuration - stdio for local processes, container for images run by a container runtime, sse or streamable-http for servers already listening'
	);

export const ServerConfigsSchema = z
	.record(McpServerConfigSchema)
	.describe('Named collection of MCP server configurations (server id -> configuration)');

/** Launch configuration after defaults have been applied. */
export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;
export type McpServerConfigInput = z.input<typeof McpServerConfigSchema>;
export type ServerConfigs = z.infer<typeof ServerConfigsSchema>;
export type ServerConfigsInput = z.input<typeof ServerConfigsSchema>;
export type SideChannelConfig = z.infer<typeof SideChannelConfigSchema>;

/**
 * Parse a single launch configuration, applying defaults.
 * Throws a ZodError describing every invalid field.
 */
export function parseServerConfig(input: unknown): McpServerConfig {
	return McpServerConfigSchema.parse(input);
}
