import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { CommandParser, type CliControls, type CommandContext } from '../parser.js';
import { ScriptedClient } from '../../../core/brain/reasoning/__test__/scripted-client.js';
import { createAssistant } from './helpers.js';

describe('CommandParser', () => {
	let parser: CommandParser;
	let controls: CliControls;
	let context: CommandContext;
	let output: string[];

	beforeEach(() => {
		chalk.level = 0;
		parser = new CommandParser();
		controls = { toggleMultiline: vi.fn(() => true), exit: vi.fn(async () => {}) };
		context = { assistant: createAssistant(), controls };
		output = [];
		vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
			output.push(String(line));
		});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe('parseInput', () => {
		it('should identify slash commands correctly', () => {
			expect(parser.parseInput('/help')).toEqual({
				isCommand: true,
				command: 'help',
				args: [],
				rawInput: '/help',
			});
		});

		it('should parse command with arguments', () => {
			const result = parser.parseInput('/mode   agent  ');
			expect(result.command).toBe('mode');
			expect(result.args).toEqual(['agent']);
			expect(result.rawInput).toBe('/mode   agent');
		});

		it('should identify regular prompts correctly', () => {
			expect(parser.parseInput('  conda env list ')).toEqual({
				isCommand: false,
				rawInput: 'conda env list',
			});
		});

		it('should handle empty commands', () => {
			const result = parser.parseInput('/');
			expect(result.isCommand).toBe(true);
			expect(result.command).toBe('');
			expect(result.args).toEqual([]);
		});
	});

	describe('getCommandSuggestions', () => {
		it('should return commands and aliases that match', () => {
			expect(parser.getCommandSuggestions('m')).toEqual([
				{ name: 'ml', description: 'Alias for /multiline' },
				{ name: 'mode', description: 'Show or switch the session mode' },
				{ name: 'multiline', description: 'Toggle multiline input' },
			]);
		});

		it('should return empty array for non-matching partial', () => {
			expect(parser.getCommandSuggestions('xyz')).toEqual([]);
		});
	});

	describe('hasCommand', () => {
		it('should know commands and their aliases', () => {
			expect(parser.hasCommand('servers')).toBe(true);
			expect(parser.hasCommand('quit')).toBe(true);
			expect(parser.hasCommand('memory')).toBe(false);
		});
	});

	describe('formatCommandHelp', () => {
		it('should include usage and aliases when detailed', () => {
			expect(parser.formatCommandHelp('h', true)).toBe(
				'/help - Show help information for commands\n  Usage: /help [command]\n  Aliases: /h, /?'
			);
		});
	});

	describe('executeCommand', () => {
		it('should reject unknown commands', async () => {
			expect(await parser.executeCommand('memory', [], context)).toBe(false);
			expect(output[0]).toBe('Unknown command: /memory');
		});

		it('should show the current mode', async () => {
			expect(await parser.executeCommand('mode', [], context)).toBe(true);
			expect(output).toEqual(['Current mode: chat']);
		});

		it('should switch modes', async () => {
			expect(await parser.executeCommand('mode', ['agent'], context)).toBe(true);
			expect(context.assistant.session.getMode()).toBe('agent');
		});

		it('should refuse unknown modes', async () => {
			expect(await parser.executeCommand('mode', ['shell'], context)).toBe(false);
			expect(context.assistant.session.getMode()).toBe('chat');
			expect(output).toEqual(["Unknown mode 'shell'. Choose one of: chat, terminal, agent"]);
		});

		it('should toggle multiline input through the controls', async () => {
			await parser.executeCommand('ml', [], context);
			expect(controls.toggleMultiline).toHaveBeenCalledTimes(1);
			expect(output).toEqual(['Multiline input on; send with an empty line']);
		});

		it('should clear the history', async () => {
			const assistant = createAssistant({ client: new ScriptedClient([], ['hi']) });
			for await (const event of assistant.session.run('hello')) {
				expect(event.type).toBe('text_chunk');
			}
			expect(assistant.session.getMessages()).toHaveLength(3);

			await parser.executeCommand('clear', [], { assistant, controls });

			expect(assistant.session.getMessages()).toEqual([{ role: 'system', content: 'Prefer conda over pip.' }]);
			expect(output).toEqual(['Conversation history cleared']);
		});

		it('should list configured servers with their state', async () => {
			await parser.executeCommand('servers', [], context);
			expect(output).toEqual([
				'\nTool servers:',
				'  conda [stdio, lenient] disconnected',
				'  jupyter [container, lenient] disabled',
				'Agent mode connects every server for each turn and closes them afterwards\n',
			]);
		});

		it('should exit through the controls', async () => {
			expect(await parser.executeCommand('quit', [], context)).toBe(true);
			expect(controls.exit).toHaveBeenCalledTimes(1);
		});

		it('should report failing handlers', async () => {
			parser.registerCommand({
				name: 'boom',
				description: 'Always fails',
				handler: async () => {
					throw new Error('kaput');
				},
			});
			expect(await parser.executeCommand('boom', [], context)).toBe(false);
			expect(output).toEqual(['Error executing /boom: kaput']);
		});

		it('should print help for a single command', async () => {
			expect(await parser.executeCommand('help', ['exit'], context)).toBe(true);
			expect(output).toEqual(['\n/exit - Close every tool server and exit\n  Aliases: /quit, /q\n']);
		});
	});
});
