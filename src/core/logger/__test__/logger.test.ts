import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Logger, createLogger, logger, redactSensitiveData } from '../index.js';

describe('Logger', () => {
	let consoleLog: MockInstance<typeof console.log>;

	beforeEach(() => {
		consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
	});

	describe('levels', () => {
		it('reads the default level from NBCONDA_LOG_LEVEL', () => {
			vi.stubEnv('NBCONDA_LOG_LEVEL', 'debug');
			expect(new Logger().getLevel()).toBe('debug');
		});

		it('falls back to info for an unknown level', () => {
			vi.stubEnv('NBCONDA_LOG_LEVEL', 'chatty');
			expect(new Logger().getLevel()).toBe('info');
		});

		it('prefers the level option', () => {
			vi.stubEnv('NBCONDA_LOG_LEVEL', 'debug');
			expect(new Logger({ level: 'WARN' }).getLevel()).toBe('warn');
		});

		it('keeps the current level when asked for an invalid one', () => {
			const testLogger = new Logger({ level: 'info', silent: true });
			testLogger.setLevel('loud');
			expect(testLogger.getLevel()).toBe('info');
		});

		it('changes the shared logger level', () => {
			const original = logger.getLevel();
			logger.setLevel('debug');
			expect(logger.getLevel()).toBe('debug');
			logger.setLevel(original);
		});
	});

	describe('silent mode', () => {
		it('does not print tool panels', () => {
			const testLogger = createLogger({ silent: true });
			testLogger.toolCall('list_envs', {});
			testLogger.toolResult('list_envs', 'base', false);
			expect(consoleLog).not.toHaveBeenCalled();
		});
	});

	describe('tool panels', () => {
		it('prints a tool prediction with its parameters', () => {
			createLogger().toolCall('create_env', { name: 'ml' });

			expect(consoleLog).toHaveBeenCalledTimes(1);
			const panel = String(consoleLog.mock.calls[0]?.[0]);
			expect(panel).toContain('Tool Prediction');
			expect(panel).toContain('create_env');
			expect(panel).toContain('"name": "ml"');
		});

		it('titles failed results as errors', () => {
			createLogger().toolResult('run_cell', 'Kernel not found', true);

			const panel = String(consoleLog.mock.calls[0]?.[0]);
			expect(panel).toContain('Tool Error');
			expect(panel).toContain('Kernel not found');
		});
	});
});

describe('redactSensitiveData', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('masks assignments of sensitive keys', () => {
		expect(redactSensitiveData('apiKey=test-secret')).toBe('apiKey=***REDACTED***');
	});

	it('keeps quotes around masked JSON values', () => {
		expect(redactSensitiveData('{"token": "test-token", "image": "jupyter"}')).toBe(
			'{"token": "***REDACTED***", "image": "jupyter"}'
		);
	});

	it('leaves ordinary text alone', () => {
		expect(redactSensitiveData('Connected to conda in 42ms')).toBe('Connected to conda in 42ms');
	});

	it('can be disabled with REDACT_SECRETS=false', () => {
		vi.stubEnv('REDACT_SECRETS', 'false');
		expect(redactSensitiveData('apiKey=test-secret')).toBe('apiKey=test-secret');
	});
});
