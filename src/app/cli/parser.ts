import chalk from 'chalk';
import type { Assistant } from '../../core/brain/agent/agent.js';
import { SESSION_MODES, isSessionMode } from '../../core/session/chat-session.js';

/**
 * Hooks into the interactive loop that commands can drive.
 */
export interface CliControls {
	/** Returns whether multiline input is now on */
	toggleMultiline(): boolean;
	exit(): Promise<void>;
}

export interface CommandContext {
	assistant: Assistant;
	controls: CliControls;
}

export type CommandHandler = (args: string[], context: CommandContext) => Promise<boolean>;

export interface CommandDefinition {
	name: string;
	description: string;
	usage?: string;
	aliases?: string[];
	handler: CommandHandler;
}

export interface ParsedInput {
	isCommand: boolean;
	command?: string;
	args?: string[];
	rawInput: string;
}

export interface CommandSuggestion {
	name: string;
	description: string;
}

/**
 * Slash command registry for the interactive CLI.
 */
export class CommandParser {
	private commands: Map<string, CommandDefinition> = new Map();
	private aliases: Map<string, string> = new Map();

	constructor() {
		this.initializeCommands();
	}

	/**
	 * Anything starting with `/` is a command; the rest goes to the session.
	 */
	parseInput(input: string): ParsedInput {
		const trimmed = input.trim();

		if (!trimmed.startsWith('/')) {
			return { isCommand: false, rawInput: trimmed };
		}

		const parts = trimmed.slice(1).split(/\s+/).filter(part => part.length > 0);
		return {
			isCommand: true,
			command: parts[0] ?? '',
			args: parts.slice(1),
			rawInput: trimmed,
		};
	}

	/**
	 * Returns false when the command is unknown or failed.
	 */
	async executeCommand(command: string, args: string[], context: CommandContext): Promise<boolean> {
		const definition = this.resolve(command);
		if (!definition) {
			console.log(chalk.red(`Unknown command: /${command}`));
			console.log(chalk.gray('Use /help to see available commands'));
			return false;
		}

		try {
			return await definition.handler(args, context);
		} catch (error) {
			console.log(
				chalk.red(
					`Error executing /${definition.name}: ${error instanceof Error ? error.message : String(error)}`
				)
			);
			return false;
		}
	}

	getCommandSuggestions(partial: string): CommandSuggestion[] {
		const suggestions: CommandSuggestion[] = [];

		for (const definition of this.commands.values()) {
			if (definition.name.startsWith(partial)) {
				suggestions.push({ name: definition.name, description: definition.description });
			}
		}
		for (const [alias, target] of this.aliases) {
			if (alias.startsWith(partial)) {
				suggestions.push({ name: alias, description: `Alias for /${target}` });
			}
		}

		return suggestions.sort((a, b) => a.name.localeCompare(b.name));
	}

	formatCommandHelp(name: string, detailed = false): string {
		const definition = this.resolve(name);
		if (!definition) {
			return chalk.red(`Unknown command: ${name}`);
		}

		let help = `${chalk.cyan(`/${definition.name}`)} - ${definition.description}`;
		if (detailed) {
			if (definition.usage) {
				help += `\n  ${chalk.gray('Usage:')} ${definition.usage}`;
			}
			if (definition.aliases && definition.aliases.length > 0) {
				help += `\n  ${chalk.gray('Aliases:')} ${definition.aliases.map(alias => `/${alias}`).join(', ')}`;
			}
		}
		return help;
	}

	registerCommand(definition: CommandDefinition): void {
		this.commands.set(definition.name, definition);
		for (const alias of definition.aliases ?? []) {
			this.aliases.set(alias, definition.name);
		}
	}

	hasCommand(command: string): boolean {
		return this.commands.has(command) || this.aliases.has(command);
	}

	getAllCommands(): CommandDefinition[] {
		return Array.from(this.commands.values());
	}

	private resolve(command: string): CommandDefinition | undefined {
		const name = this.aliases.get(command) ?? command;
		return this.commands.get(name);
	}

	private displayHelp(commandName?: string): void {
		if (commandName) {
			console.log('\n' + this.formatCommandHelp(commandName, true) + '\n');
			return;
		}

		console.log(chalk.cyan('\nAvailable commands:\n'));
		for (const definition of this.getAllCommands().sort((a, b) => a.name.localeCompare(b.name))) {
			console.log(`  ${this.formatCommandHelp(definition.name)}`);
		}
		console.log('');
		console.log(chalk.gray('Ctrl+T cycles chat, terminal and agent mode'));
		console.log(chalk.gray('Ctrl+L toggles multiline input; an empty line sends it'));
	}

	private initializeCommands(): void {
		this.registerCommand({
			name: 'help',
			description: 'Show help information for commands',
			usage: '/help [command]',
			aliases: ['h', '?'],
			handler: async args => {
				const commandName = args[0];
				if (commandName && !this.hasCommand(commandName)) {
					console.log(chalk.red(`Unknown command: ${commandName}`));
					return false;
				}
				this.displayHelp(commandName);
				return true;
			},
		});

		this.registerCommand({
			name: 'mode',
			description: 'Show or switch the session mode',
			usage: `/mode [${SESSION_MODES.join('|')}]`,
			handler: async (args, { assistant }) => {
				const requested = args[0];
				if (!requested) {
					console.log(chalk.cyan(`Current mode: ${assistant.session.getMode()}`));
					return true;
				}
				if (!isSessionMode(requested)) {
					console.log(chalk.red(`Unknown mode '${requested}'. Choose one of: ${SESSION_MODES.join(', ')}`));
					return false;
				}
				assistant.session.setMode(requested);
				console.log(chalk.green(`Switched to ${requested} mode`));
				return true;
			},
		});

		this.registerCommand({
			name: 'multiline',
			description: 'Toggle multiline input',
			aliases: ['ml'],
			handler: async (_args, { controls }) => {
				const enabled = controls.toggleMultiline();
				console.log(
					chalk.green(enabled ? 'Multiline input on; send with an empty line' : 'Multiline input off')
				);
				return true;
			},
		});

		this.registerCommand({
			name: 'clear',
			description: 'Clear the conversation history',
			aliases: ['reset'],
			handler: async (_args, { assistant }) => {
				assistant.session.clear();
				console.log(chalk.green('Conversation history cleared'));
				return true;
			},
		});

		this.registerCommand({
			name: 'servers',
			description: 'List configured tool servers and their state',
			handler: async (_args, { assistant }) => {
				const servers = Object.entries(assistant.getConfig().mcpServers);
				if (servers.length === 0) {
					console.log(chalk.gray('No tool servers configured'));
					return true;
				}

				const failed = assistant.manager.getFailedConnections();
				console.log(chalk.cyan('\nTool servers:'));
				for (const [serverId, config] of servers) {
					const state = config.enabled
						? (assistant.manager.getHandle(serverId)?.state ?? 'disconnected')
						: 'disabled';
					console.log(`  ${chalk.yellow(serverId)} ${chalk.gray(`[${config.type}, ${config.connectionMode}]`)} ${state}`);
					const lastError = failed[serverId];
					if (lastError) {
						console.log(chalk.red(`    last error: ${lastError}`));
					}
				}
				console.log(chalk.gray('Agent mode connects every server for each turn and closes them afterwards\n'));
				return true;
			},
		});

		this.registerCommand({
			name: 'exit',
			description: 'Close every tool server and exit',
			aliases: ['quit', 'q'],
			handler: async (_args, { controls }) => {
				await controls.exit();
				return true;
			},
		});
	}
}

export const commandParser = new CommandParser();
