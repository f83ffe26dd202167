import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file once, at first import
config();

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	NBCONDA_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silly']).default('info'),
	NBCONDA_ERROR_LOG: z.string().optional(),
	REDACT_SECRETS: z.boolean().default(true),
	// Model provider
	OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY must not be empty'),
	OPENAI_BASE_URL: z.string().url().optional(),
	// MCP
	MCP_GLOBAL_TIMEOUT: z.number().int().positive().optional(),
	// Tool server launch settings referenced from the agent config
	JUPYTER_SERVER_URL: z.string().url().default('http://host.docker.internal:8888'),
	JUPYTER_TOKEN: z.string().default(''),
	NOTEBOOK_PATH: z.string().default('notebook.ipynb'),
	DOCKER_PATH: z.string().default('docker'),
	UV_PATH: z.string().default('uv'),
});

export type EnvSchema = z.infer<typeof envSchema>;
export type EnvKey = keyof EnvSchema;

const parseOptionalInt = (value: string | undefined): number | undefined => {
	if (!value) return undefined;
	const parsed = parseInt(value, 10);
	return isNaN(parsed) ? undefined : parsed;
};

function readEnvValue(prop: string): EnvSchema[EnvKey] | string | undefined {
	switch (prop) {
		case 'NODE_ENV':
			return process.env.NODE_ENV || 'development';
		case 'NBCONDA_LOG_LEVEL':
			return process.env.NBCONDA_LOG_LEVEL || 'info';
		case 'REDACT_SECRETS':
			return process.env.REDACT_SECRETS === 'false' ? false : true;
		case 'MCP_GLOBAL_TIMEOUT':
			return parseOptionalInt(process.env.MCP_GLOBAL_TIMEOUT);
		case 'JUPYTER_SERVER_URL':
			return process.env.JUPYTER_SERVER_URL || 'http://host.docker.internal:8888';
		case 'JUPYTER_TOKEN':
			return process.env.JUPYTER_TOKEN || '';
		case 'NOTEBOOK_PATH':
			return process.env.NOTEBOOK_PATH || 'notebook.ipynb';
		case 'DOCKER_PATH':
			return process.env.DOCKER_PATH || 'docker';
		case 'UV_PATH':
			return process.env.UV_PATH || 'uv';
		default:
			return process.env[prop];
	}
}

// A dynamic env object that always reads from process.env but provides type safety
export const env = new Proxy<EnvSchema>({} as EnvSchema, {
	get(_target, prop) {
		return typeof prop === 'string' ? readEnvValue(prop) : undefined;
	},
});

/**
 * Look up any variable by name, applying the same defaults as `env`.
 * Used for `$VAR` expansion in the agent config.
 */
export function getEnvValue(name: string): string | undefined {
	const value = readEnvValue(name);
	return value === undefined ? undefined : String(value);
}

/**
 * Validate the current environment. Called once at startup; a missing model
 * credential is a fatal configuration error, not a runtime one.
 */
export const validateEnv = (): z.SafeParseReturnType<unknown, EnvSchema> => {
	return envSchema.safeParse({
		NODE_ENV: process.env.NODE_ENV,
		NBCONDA_LOG_LEVEL: process.env.NBCONDA_LOG_LEVEL,
		NBCONDA_ERROR_LOG: process.env.NBCONDA_ERROR_LOG || undefined,
		REDACT_SECRETS: process.env.REDACT_SECRETS === 'false' ? false : true,
		OPENAI_API_KEY: process.env.OPENAI_API_KEY,
		OPENAI_BASE_URL: process.env.OPENAI_BASE_URL || undefined,
		MCP_GLOBAL_TIMEOUT: parseOptionalInt(process.env.MCP_GLOBAL_TIMEOUT),
		JUPYTER_SERVER_URL: process.env.JUPYTER_SERVER_URL || undefined,
		JUPYTER_TOKEN: process.env.JUPYTER_TOKEN,
		NOTEBOOK_PATH: process.env.NOTEBOOK_PATH || undefined,
		DOCKER_PATH: process.env.DOCKER_PATH || undefined,
		UV_PATH: process.env.UV_PATH || undefined,
	});
};
