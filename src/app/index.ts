#!/usr/bin/env node

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { Command } from 'commander';
import { z, ZodError } from 'zod';
import { validateEnv } from '../core/env.js';
import { logger } from '../core/logger/index.js';
import { Assistant } from '../core/brain/agent/agent.js';
import type { AgentConfig } from '../core/brain/agent/config.js';
import { loadAgentConfig } from '../core/brain/agent/loader.js';
import { DEFAULT_CONFIG_PATH, findPackageRoot, resolveConfigPath } from '../core/utils/path.js';
import { handleCliOptionsError, validateCliOptions, type CliOptions } from './cli/utils/options.js';
import { startHeadlessCli, startInteractiveCli } from './cli/cli.js';

function readPackageVersion(): string {
	const pkg = z
		.object({ version: z.string() })
		.safeParse(JSON.parse(readFileSync(path.join(findPackageRoot(), 'package.json'), 'utf-8')));
	return pkg.success ? pkg.data.version : '0.0.0';
}

function reportZodError(title: string, error: ZodError): void {
	logger.error(title);
	for (const issue of error.issues) {
		logger.error(`- ${issue.path.join('.') || '(root)'}: ${issue.message}`);
	}
}

async function loadConfigOrExit(opts: CliOptions): Promise<AgentConfig> {
	const configPath = resolveConfigPath(opts.config);
	logger.info(`Loading agent config from ${configPath}`);

	if (!existsSync(configPath)) {
		logger.error(`Config file not found at ${configPath}`);
		logger.error(
			opts.config === DEFAULT_CONFIG_PATH
				? `Please ensure the default config exists at ${DEFAULT_CONFIG_PATH}`
				: `Please ensure the specified config file exists at ${configPath}`
		);
		process.exit(1);
	}

	try {
		return await loadAgentConfig(configPath);
	} catch (err) {
		if (err instanceof ZodError) {
			reportZodError(`Invalid agent config in ${configPath}:`, err);
		} else {
			logger.error(err instanceof Error ? err.message : String(err));
		}
		process.exit(1);
	}
}

const program = new Command();

program
	.name('nbconda')
	.description(
		'Command-line assistant that manages Jupyter notebooks and Conda environments through MCP tool servers.\n' +
			'Run `nbconda` for the interactive CLI or `nbconda <prompt>` to run a prompt once.\n\n' +
			'Modes:\n' +
			'  - chat: talk to the model directly (default)\n' +
			'  - terminal: run shell commands and keep their output in the conversation\n' +
			'  - agent: let the model call the configured tool servers'
	)
	.version(readPackageVersion(), '-v, --version', 'output the current version')
	.argument('[prompt...]', 'Prompt to run once. Without one, the interactive CLI starts')
	.option('-c, --config <path>', 'Path to the agent config file', DEFAULT_CONFIG_PATH)
	.option('-m, --mode <mode>', 'Session mode - chat | terminal | agent', 'chat')
	.option('-s, --strict', 'Fail an agent turn when any tool server cannot connect')
	.option('--shutdown-timeout <ms>', 'Grace period for closing tool servers before they are killed')
	.option('--no-verbose', 'Only log errors')
	.action(async (prompt: string[] = []) => {
		const headlessInput = prompt.join(' ') || undefined;

		let opts: CliOptions;
		try {
			opts = validateCliOptions(program.opts());
		} catch (err) {
			handleCliOptionsError(err);
		}

		if (!opts.verbose) {
			logger.setLevel('error');
		}

		const envResult = validateEnv();
		if (!envResult.success) {
			reportZodError(
				'Invalid environment; copy .env.example to .env and fill in the values:',
				envResult.error
			);
			process.exit(1);
		}

		const config = await loadConfigOrExit(opts);
		const assistant = new Assistant(config, {
			strict: opts.strict,
			mode: opts.mode,
			...(opts.shutdownTimeout !== undefined ? { shutdownTimeoutMs: opts.shutdownTimeout } : {}),
		});
		assistant.start();

		const shutdown = async (code: number): Promise<never> => {
			await assistant.stop();
			process.exit(code);
		};
		process.once('SIGTERM', () => {
			shutdown(143).catch((err: unknown) => {
				logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exit(1);
			});
		});

		if (headlessInput) {
			let ok = false;
			try {
				ok = await startHeadlessCli(assistant, headlessInput);
			} catch (err) {
				logger.error(
					`Failed to execute headless command: ${err instanceof Error ? err.message : String(err)}`
				);
			}
			await shutdown(ok ? 0 : 1);
		}

		await startInteractiveCli(assistant);
		await shutdown(0);
	});

program.parseAsync(process.argv).catch((err: unknown) => {
	logger.error(err instanceof Error ? err.message : String(err));
	process.exit(1);
});
