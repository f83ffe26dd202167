import chalk from 'chalk';
import { logger as defaultLogger, type Logger } from '../../core/logger/index.js';
import type { SessionEvent } from '../../core/session/chat-session.js';

/**
 * One-line rendering of events that are not streamed text or tool panels.
 */
export function formatSessionEvent(event: SessionEvent): string | undefined {
	switch (event.type) {
		case 'thinking':
			return chalk.gray(`Thinking: ${event.content}`);
		case 'error':
			return chalk.red(`Error: ${event.content}`);
		case 'command_output': {
			const lines = [event.output.replace(/\n$/, '')];
			if (event.timedOut) {
				lines.push(chalk.yellow('Command timed out'));
			} else if (event.exitCode !== 0) {
				lines.push(chalk.gray(`Exit code: ${event.exitCode ?? 'unknown'}`));
			}
			return lines.filter(line => line.length > 0).join('\n') || undefined;
		}
		case 'connection': {
			const lines: string[] = [];
			if (event.connected.length > 0) {
				lines.push(chalk.gray(`Connected: ${event.connected.join(', ')}`));
			}
			for (const [serverId, message] of Object.entries(event.failed)) {
				lines.push(chalk.yellow(`Could not connect to ${serverId}: ${message}`));
			}
			return lines.length > 0 ? lines.join('\n') : undefined;
		}
		case 'shutdown': {
			const forced = event.outcomes
				.filter(entry => entry.outcome.status === 'forced')
				.map(entry => entry.serverId);
			return forced.length > 0 ? chalk.yellow(`Forced shutdown: ${forced.join(', ')}`) : undefined;
		}
		default:
			return undefined;
	}
}

/**
 * Writes session events to the terminal. Text chunks stream without newlines;
 * tool calls and results go through the logger's boxed panels.
 */
export class EventPrinter {
	private midLine = false;

	constructor(
		private logger: Logger = defaultLogger,
		private write: (text: string) => void = text => {
			process.stdout.write(text);
		}
	) {}

	print(event: SessionEvent): void {
		if (event.type === 'text_chunk') {
			this.write(event.content);
			this.midLine = event.content.length > 0 ? !event.content.endsWith('\n') : this.midLine;
			return;
		}

		this.endLine();
		if (event.type === 'tool_prediction') {
			this.logger.toolCall(event.name, event.arguments);
			return;
		}
		if (event.type === 'tool_result') {
			this.logger.toolResult(event.name, event.result, event.isError);
			return;
		}

		const line = formatSessionEvent(event);
		if (line) {
			this.write(`${line}\n`);
		}
	}

	finish(): void {
		this.endLine();
	}

	private endLine(): void {
		if (this.midLine) {
			this.write('\n');
			this.midLine = false;
		}
	}
}
