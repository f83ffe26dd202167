import { describe, it, expect, vi, beforeAll } from 'vitest';
import chalk from 'chalk';
import { EventPrinter, formatSessionEvent } from '../render.js';
import { silentLogger } from './helpers.js';

describe('formatSessionEvent', () => {
	beforeAll(() => {
		chalk.level = 0;
	});

	it('should label thinking and errors', () => {
		expect(formatSessionEvent({ type: 'thinking', iteration: 1, content: 'Let me check.' })).toBe(
			'Thinking: Let me check.'
		);
		expect(formatSessionEvent({ type: 'error', content: 'boom' })).toBe('Error: boom');
	});

	it('should print command output without its trailing newline', () => {
		expect(
			formatSessionEvent({
				type: 'command_output',
				command: 'conda env list',
				output: 'base  *  /opt/conda\n',
				exitCode: 0,
				timedOut: false,
			})
		).toBe('base  *  /opt/conda');
	});

	it('should mention non-zero exit codes and timeouts', () => {
		expect(
			formatSessionEvent({ type: 'command_output', command: 'x', output: '', exitCode: 127, timedOut: false })
		).toBe('Exit code: 127');
		expect(
			formatSessionEvent({
				type: 'command_output',
				command: 'sleep 100',
				output: 'partial\n',
				exitCode: null,
				timedOut: true,
			})
		).toBe('partial\nCommand timed out');
	});

	it('should summarise connections', () => {
		expect(
			formatSessionEvent({
				type: 'connection',
				connected: ['conda'],
				failed: { jupyter: 'docker: not found' },
				skipped: [],
			})
		).toBe('Connected: conda\nCould not connect to jupyter: docker: not found');
		expect(formatSessionEvent({ type: 'connection', connected: [], failed: {}, skipped: ['x'] })).toBeUndefined();
	});

	it('should only mention forced shutdowns', () => {
		expect(
			formatSessionEvent({
				type: 'shutdown',
				outcomes: [
					{ serverId: 'conda', outcome: { status: 'graceful', durationMs: 5 } },
					{ serverId: 'jupyter', outcome: { status: 'forced', durationMs: 10000 } },
				],
			})
		).toBe('Forced shutdown: jupyter');
		expect(
			formatSessionEvent({
				type: 'shutdown',
				outcomes: [{ serverId: 'conda', outcome: { status: 'graceful', durationMs: 5 } }],
			})
		).toBeUndefined();
	});
});

describe('EventPrinter', () => {
	beforeAll(() => {
		chalk.level = 0;
	});

	it('should stream text and end the line before other output', () => {
		const written: string[] = [];
		const printer = new EventPrinter(silentLogger, text => written.push(text));

		printer.print({ type: 'text_chunk', content: 'Hello' });
		printer.print({ type: 'text_chunk', content: ' world' });
		printer.print({ type: 'error', content: 'boom' });
		printer.finish();

		expect(written).toEqual(['Hello', ' world', '\n', 'Error: boom\n']);
	});

	it('should end a streamed answer on finish', () => {
		const written: string[] = [];
		const printer = new EventPrinter(silentLogger, text => written.push(text));

		printer.print({ type: 'text_chunk', content: 'Done.' });
		printer.finish();
		printer.finish();

		expect(written).toEqual(['Done.', '\n']);
	});

	it('should hand tool events to the logger panels', () => {
		const toolCall = vi.spyOn(silentLogger, 'toolCall');
		const toolResult = vi.spyOn(silentLogger, 'toolResult');
		const printer = new EventPrinter(silentLogger, () => {});

		printer.print({ type: 'tool_prediction', iteration: 1, name: 'list_envs', arguments: { verbose: true } });
		printer.print({ type: 'tool_result', iteration: 1, name: 'list_envs', result: 'base', isError: false });

		expect(toolCall).toHaveBeenCalledWith('list_envs', { verbose: true });
		expect(toolResult).toHaveBeenCalledWith('list_envs', 'base', false);
		toolCall.mockRestore();
		toolResult.mockRestore();
	});
});
