import * as readline from 'readline';
import chalk from 'chalk';
import type { Assistant } from '../../core/brain/agent/agent.js';
import { logger } from '../../core/logger/index.js';
import type { ChatSession, SessionMode } from '../../core/session/chat-session.js';
import { commandParser, type CliControls, type CommandContext, type CommandParser } from './parser.js';
import { EventPrinter } from './render.js';

const CONTINUATION_PROMPT = chalk.gray('... ');

export function promptFor(mode: SessionMode): string {
	return chalk.blue(`nbconda:${mode}> `);
}

/**
 * Tab completion for slash commands and their aliases. Only the command
 * word completes; arguments and plain input are left alone.
 */
export function completeCommand(parser: CommandParser, line: string): [string[], string] {
	if (!line.startsWith('/') || /\s/.test(line)) {
		return [[], line];
	}
	return [parser.getCommandSuggestions(line.slice(1)).map(suggestion => `/${suggestion.name}`), line];
}

/**
 * Run one turn and print its events. Resolves to false when the turn
 * produced an error.
 */
export async function runTurn(
	session: ChatSession,
	input: string,
	printer: EventPrinter,
	signal?: AbortSignal
): Promise<boolean> {
	let ok = true;
	try {
		for await (const event of session.run(input, signal ? { signal } : {})) {
			if (event.type === 'error') {
				ok = false;
			}
			printer.print(event);
		}
	} finally {
		printer.finish();
	}
	return ok;
}

/**
 * One-shot mode: run the prompt in the session's current mode and return.
 */
export async function startHeadlessCli(
	assistant: Assistant,
	input: string,
	printer: EventPrinter = new EventPrinter()
): Promise<boolean> {
	if (!input.trim()) {
		logger.warn('Nothing to run: the prompt is empty');
		return false;
	}
	return runTurn(assistant.session, input, printer);
}

export interface InteractiveCliOptions {
	input?: NodeJS.ReadableStream;
	output?: NodeJS.WritableStream;
	/** Defaults to whether the input is a TTY */
	terminal?: boolean;
	printer?: EventPrinter;
	parser?: CommandParser;
}

/**
 * Readline loop. Lines run one at a time, in the order they were typed;
 * Ctrl+T cycles the mode, Ctrl+L toggles multiline input and Ctrl+C cancels
 * the running turn (or exits when idle). Resolves once the input is closed
 * and every line read before that has run.
 */
export class InteractiveCli implements CliControls {
	private rl: readline.Interface;
	private printer: EventPrinter;
	private parser: CommandParser;
	private multiline = false;
	private buffer: string[] = [];
	private queue: Promise<void> = Promise.resolve();
	private abortController: AbortController | undefined;
	private closed = false;
	private exiting = false;

	constructor(
		private assistant: Assistant,
		options: InteractiveCliOptions = {}
	) {
		const input = options.input ?? process.stdin;
		const terminal = options.terminal ?? process.stdin.isTTY === true;
		this.printer = options.printer ?? new EventPrinter();
		this.parser = options.parser ?? commandParser;

		this.rl = readline.createInterface({
			input,
			output: options.output ?? process.stdout,
			terminal,
			prompt: promptFor(assistant.session.getMode()),
			completer: (line: string) => completeCommand(this.parser, line),
		});

		if (terminal) {
			readline.emitKeypressEvents(input, this.rl);
			input.on('keypress', (_text: string | undefined, key: readline.Key | undefined) => {
				if (key?.ctrl && key.name === 't') {
					this.cycleMode();
				} else if (key?.ctrl && key.name === 'l') {
					this.toggleMultiline();
				}
			});
		}
	}

	run(): Promise<void> {
		return new Promise(resolve => {
			this.rl.on('line', line => {
				this.queue = this.queue.then(() => this.handleLine(line));
			});
			this.rl.on('SIGINT', () => {
				if (this.abortController) {
					this.abortController.abort();
					console.log(chalk.yellow('\nCancelled'));
				} else {
					this.rl.close();
				}
			});
			this.rl.on('close', () => {
				this.closed = true;
				this.queue.then(resolve, resolve);
			});

			this.rl.prompt();
		});
	}

	cycleMode(): SessionMode {
		const mode = this.assistant.session.cycleMode();
		this.refreshPrompt();
		this.rl.prompt(true);
		return mode;
	}

	toggleMultiline(): boolean {
		this.multiline = !this.multiline;
		this.buffer = [];
		this.refreshPrompt();
		return this.multiline;
	}

	async exit(): Promise<void> {
		this.exiting = true;
		this.rl.close();
	}

	isMultiline(): boolean {
		return this.multiline;
	}

	private async handleLine(line: string): Promise<void> {
		if (this.exiting) {
			return;
		}

		try {
			const input = this.collect(line);
			if (input !== undefined) {
				await this.dispatch(input);
			}
		} catch (error) {
			logger.error(`[CLI] ${error instanceof Error ? error.message : String(error)}`);
		}

		if (!this.closed) {
			this.refreshPrompt();
			this.rl.prompt();
		}
	}

	/**
	 * In multiline mode lines accumulate until an empty one; a command typed
	 * on its own line still runs immediately.
	 */
	private collect(line: string): string | undefined {
		if (!this.multiline || (this.buffer.length === 0 && line.trim().startsWith('/'))) {
			return line;
		}
		if (line.trim() !== '') {
			this.buffer.push(line);
			return undefined;
		}
		const input = this.buffer.join('\n');
		this.buffer = [];
		return input;
	}

	private async dispatch(input: string): Promise<void> {
		const parsed = this.parser.parseInput(input);
		if (!parsed.rawInput) {
			return;
		}

		if (parsed.isCommand) {
			const context: CommandContext = { assistant: this.assistant, controls: this };
			await this.parser.executeCommand(parsed.command ?? '', parsed.args ?? [], context);
			return;
		}

		this.abortController = new AbortController();
		try {
			await runTurn(this.assistant.session, parsed.rawInput, this.printer, this.abortController.signal);
		} finally {
			this.abortController = undefined;
		}
	}

	private refreshPrompt(): void {
		this.rl.setPrompt(
			this.multiline && this.buffer.length > 0
				? CONTINUATION_PROMPT
				: promptFor(this.assistant.session.getMode())
		);
	}
}

export async function startInteractiveCli(
	assistant: Assistant,
	options: InteractiveCliOptions = {}
): Promise<void> {
	console.log(chalk.cyan('nbconda interactive CLI'));
	console.log(chalk.gray('Type /help for commands; Ctrl+T switches between chat, terminal and agent mode.'));
	console.log(chalk.gray(`Mode: ${assistant.session.getMode()}\n`));

	await new InteractiveCli(assistant, options).run();
}
