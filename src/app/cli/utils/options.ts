import { z } from 'zod';
import { logger } from '../../../core/logger/index.js';
import { SESSION_MODES } from '../../../core/session/chat-session.js';
import { DEFAULT_CONFIG_PATH } from '../../../core/utils/path.js';

const cliOptionSchema = z.object({
	verbose: z.boolean().default(true),
	mode: z
		.enum(SESSION_MODES, {
			errorMap: () => ({ message: `Mode must be one of ${SESSION_MODES.join(', ')}` }),
		})
		.default('chat'),
	strict: z.boolean().default(false),
	// commander hands numbers over as strings
	shutdownTimeout: z.coerce
		.number({ invalid_type_error: 'Shutdown timeout must be a number of milliseconds' })
		.int('Shutdown timeout must be a whole number of milliseconds')
		.positive('Shutdown timeout must be positive')
		.optional(),
	config: z.string().min(1, 'Config path must not be empty').default(DEFAULT_CONFIG_PATH),
});

export type CliOptions = z.infer<typeof cliOptionSchema>;

/**
 * Throws the ZodError unchanged so the caller can report every field.
 */
export function validateCliOptions(opts: Record<string, unknown>): CliOptions {
	const result = cliOptionSchema.safeParse({
		verbose: opts.verbose,
		mode: opts.mode,
		strict: opts.strict,
		shutdownTimeout: opts.shutdownTimeout,
		config: opts.config,
	});

	if (!result.success) {
		throw result.error;
	}
	return result.data;
}

export function reportCliOptionsError(error: unknown): void {
	if (error instanceof z.ZodError) {
		logger.error('Invalid command-line options detected:');
		error.errors.forEach(err => {
			const fieldName = err.path.join('.') || 'Unknown Option';
			logger.error(`- Option '${fieldName}': ${err.message}`);
		});
		logger.error('Please check your command-line arguments or run with --help for usage details.');
	} else {
		logger.error(
			`Validation error: ${error instanceof Error ? error.message : JSON.stringify(error)}`
		);
	}
}

export function handleCliOptionsError(error: unknown): never {
	reportCliOptionsError(error);
	process.exit(1);
}
