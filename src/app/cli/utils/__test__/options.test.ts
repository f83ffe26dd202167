import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { logger } from '../../../../core/logger/index.js';
import { reportCliOptionsError, validateCliOptions } from '../options.js';

describe('validateCliOptions', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('should apply defaults', () => {
		expect(validateCliOptions({ verbose: true })).toEqual({
			verbose: true,
			mode: 'chat',
			strict: false,
			config: 'agent/nbconda.yml',
		});
	});

	it('should coerce the shutdown timeout', () => {
		const opts = validateCliOptions({ mode: 'agent', strict: true, shutdownTimeout: '5000', config: 'my.yml' });

		expect(opts).toMatchObject({ mode: 'agent', strict: true, shutdownTimeout: 5000, config: 'my.yml' });
	});

	it('should reject unknown modes', () => {
		expect(() => validateCliOptions({ mode: 'shell' })).toThrow(ZodError);
		try {
			validateCliOptions({ mode: 'shell' });
		} catch (error) {
			expect(error instanceof ZodError && error.issues[0]?.message).toBe(
				'Mode must be one of chat, terminal, agent'
			);
		}
	});

	it('should reject timeouts that are not positive integers', () => {
		for (const shutdownTimeout of ['soon', '0', '1.5']) {
			const attempt = () => validateCliOptions({ shutdownTimeout });
			expect(attempt).toThrow(ZodError);
		}
	});

	it('should report each invalid option', () => {
		const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => {});

		try {
			validateCliOptions({ mode: 'shell' });
		} catch (error) {
			reportCliOptionsError(error);
		}

		expect(errorSpy).toHaveBeenCalledWith("- Option 'mode': Mode must be one of chat, terminal, agent");
	});
});
