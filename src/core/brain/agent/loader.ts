import { promises as fs } from 'fs';
import { parse as parseYaml } from 'yaml';
import { logger } from '../../logger/index.js';
import { getEnvValue } from '../../env.js';
import { AgentConfigSchema, type AgentConfig } from './config.js';

const ENV_REFERENCE = /\$([A-Z_][A-Z0-9_]*)|\$\{([A-Z_][A-Z0-9_]*)\}/gi;

/**
 * Replace `$VAR` and `${VAR}` references with environment values. Missing
 * variables expand to an empty string. Expanded values stay strings; numeric
 * fields convert them during schema validation.
 */
export function expandEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(ENV_REFERENCE, (_match, bare: string | undefined, braced: string | undefined) => {
			const name = bare ?? braced ?? '';
			return getEnvValue(name) ?? '';
		});
	}
	if (Array.isArray(value)) {
		return value.map(item => expandEnvVars(item));
	}
	if (typeof value === 'object' && value !== null) {
		const result: Record<string, unknown> = {};
		for (const [key, entry] of Object.entries(value)) {
			result[key] = expandEnvVars(entry);
		}
		return result;
	}
	return value;
}

/**
 * Read, expand and validate the YAML agent config. Schema violations surface
 * as the ZodError so callers can report them per field.
 */
export async function loadAgentConfig(configPath: string): Promise<AgentConfig> {
	logger.debug(`Loading agent config from: ${configPath}`);

	let raw: unknown;
	try {
		const fileContent = await fs.readFile(configPath, 'utf-8');
		try {
			raw = parseYaml(fileContent);
		} catch (parseError) {
			throw new Error(
				`Failed to parse YAML: ${parseError instanceof Error ? parseError.message : String(parseError)}`
			);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to load config file at ${configPath}: ${message}`, { cause: error });
	}

	return AgentConfigSchema.parse(expandEnvVars(raw ?? {}));
}
