import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChatSession, nextMode, isSessionMode, type SessionEvent } from '../chat-session.js';
import type { ShellResult, ShellRunner, ShellRunOptions } from '../shell.js';
import { AgentConfigSchema } from '../../brain/agent/config.js';
import { ConnectionManager } from '../../mcp/manager.js';
import { createLogger } from '../../logger/index.js';
import {
	fakeTransportFactory,
	tool,
	type FakeTransport,
	type FakeTransportOptions,
} from '../../mcp/__test__/fake-transport.js';
import { ScriptedClient, callTools, text } from '../../brain/reasoning/__test__/scripted-client.js';

const logger = createLogger({ silent: true });
const SYSTEM = { role: 'system', content: 'Prefer conda over pip.' } as const;

class FakeShell implements ShellRunner {
	readonly runs: Array<{ command: string; options: ShellRunOptions }> = [];

	constructor(private readonly result: ShellResult | Error) {}

	async run(command: string, options: ShellRunOptions): Promise<ShellResult> {
		this.runs.push({ command, options });
		if (this.result instanceof Error) throw this.result;
		return this.result;
	}
}

async function collect(stream: AsyncIterable<SessionEvent>): Promise<SessionEvent[]> {
	const events: SessionEvent[] = [];
	for await (const event of stream) {
		events.push(event);
	}
	return events;
}

describe('mode helpers', () => {
	it('should cycle chat, terminal and agent', () => {
		expect(nextMode('chat')).toBe('terminal');
		expect(nextMode('terminal')).toBe('agent');
		expect(nextMode('agent')).toBe('chat');
	});

	it('should recognise mode names', () => {
		expect(isSessionMode('agent')).toBe(true);
		expect(isSessionMode('shell')).toBe(false);
	});
});

describe('ChatSession', () => {
	let transports: Map<string, FakeTransport>;
	let manager: ConnectionManager;

	const config = AgentConfigSchema.parse({
		systemPrompt: SYSTEM.content,
		mcpServers: { conda: { type: 'stdio', command: 'fake-server' } },
	});

	const setup = (options: FakeTransportOptions = {}) => {
		const fake = fakeTransportFactory({ conda: { tools: [tool('list_envs')], ...options } });
		transports = fake.transports;
		manager = new ConnectionManager({ transportFactory: fake.factory, logger });
	};

	const conda = (): FakeTransport => {
		const transport = transports.get('conda');
		if (!transport) throw new Error('conda transport was not created');
		return transport;
	};

	beforeEach(() => {
		setup();
	});

	describe('chat mode', () => {
		it('should stream the reply and record both sides', async () => {
			const client = new ScriptedClient([], ['conda create ', '-n ml']);
			const session = new ChatSession({ client, manager, config, logger });

			const events = await collect(session.run('  how do I make an env?  '));

			expect(events).toEqual([
				{ type: 'text_chunk', content: 'conda create ' },
				{ type: 'text_chunk', content: '-n ml' },
			]);
			expect(client.streamed[0]).toEqual([SYSTEM, { role: 'user', content: 'how do I make an env?' }]);
			expect(session.getMessages()).toEqual([
				SYSTEM,
				{ role: 'user', content: 'how do I make an env?' },
				{ role: 'assistant', content: 'conda create -n ml' },
			]);
		});

		it('should ignore blank input', async () => {
			const client = new ScriptedClient([], ['unused']);
			const session = new ChatSession({ client, manager, config, logger });

			expect(await collect(session.run('   '))).toEqual([]);
			expect(client.streamed).toEqual([]);
		});

		it('should record a failed stream as an error message', async () => {
			const client = new ScriptedClient([], ['partial', new Error('connection reset')]);
			const session = new ChatSession({ client, manager, config, logger });

			const events = await collect(session.run('hello'));

			expect(events).toEqual([
				{ type: 'text_chunk', content: 'partial' },
				{ type: 'error', content: 'connection reset' },
			]);
			expect(session.getMessages()).toEqual([
				SYSTEM,
				{ role: 'user', content: 'hello' },
				{ role: 'assistant', content: 'Error: connection reset' },
			]);
		});

		it('should run turns one at a time', async () => {
			const client = new ScriptedClient([], ['ok']);
			const session = new ChatSession({ client, manager, config, logger });

			await Promise.all([collect(session.run('one')), collect(session.run('two'))]);

			expect(session.getMessages()).toEqual([
				SYSTEM,
				{ role: 'user', content: 'one' },
				{ role: 'assistant', content: 'ok' },
				{ role: 'user', content: 'two' },
				{ role: 'assistant', content: 'ok' },
			]);
		});

		it('should reset the history on clear', async () => {
			const session = new ChatSession({ client: new ScriptedClient([], ['ok']), manager, config, logger });
			await collect(session.run('hello'));

			session.clear();

			expect(session.getMessages()).toEqual([SYSTEM]);
		});
	});

	describe('terminal mode', () => {
		it('should run the command and add its transcript to the history', async () => {
			const shell = new FakeShell({
				stdout: 'base  *  /opt/conda\n',
				stderr: '',
				exitCode: 0,
				timedOut: false,
			});
			const session = new ChatSession({
				client: new ScriptedClient(),
				manager,
				config,
				logger,
				shell,
				mode: 'terminal',
			});

			const events = await collect(session.run('conda env list'));

			expect(shell.runs).toEqual([{ command: 'conda env list', options: { timeoutMs: 60000 } }]);
			expect(events).toEqual([
				{
					type: 'command_output',
					command: 'conda env list',
					output: 'base  *  /opt/conda\n',
					exitCode: 0,
					timedOut: false,
				},
			]);
			expect(session.getMessages()[1]).toEqual({
				role: 'user',
				content: '[PREVIOUS COMMAND]\n\n$ conda env list\nbase  *  /opt/conda\n',
			});
		});

		it('should fall back to stderr when the command printed nothing else', async () => {
			const shell = new FakeShell({
				stdout: '',
				stderr: 'conda: command not found\n',
				exitCode: 127,
				timedOut: false,
			});
			const session = new ChatSession({
				client: new ScriptedClient(),
				manager,
				config,
				logger,
				shell,
				mode: 'terminal',
			});

			const events = await collect(session.run('conda info'));

			expect(events[0]).toMatchObject({ output: 'conda: command not found\n', exitCode: 127 });
		});

		it('should record a shell that cannot start', async () => {
			const session = new ChatSession({
				client: new ScriptedClient(),
				manager,
				config,
				logger,
				shell: new FakeShell(new Error('spawn /bin/sh ENOENT')),
				mode: 'terminal',
			});

			const events = await collect(session.run('ls'));

			expect(events).toEqual([{ type: 'error', content: 'spawn /bin/sh ENOENT' }]);
			expect(session.getMessages()[1]).toEqual({ role: 'assistant', content: 'Error: spawn /bin/sh ENOENT' });
		});
	});

	describe('agent mode', () => {
		it('should connect, run the agent, and close every server afterwards', async () => {
			const client = new ScriptedClient([
				callTools(null, ['call_1', 'list_envs', '{}']),
				text('You have base.'),
			]);
			const session = new ChatSession({ client, manager, config, logger, mode: 'agent' });

			const events = await collect(session.run('which envs?'));

			expect(events.slice(0, 4)).toEqual([
				{ type: 'connection', connected: ['conda'], failed: {}, skipped: [] },
				{ type: 'tool_prediction', iteration: 1, name: 'list_envs', arguments: {} },
				{ type: 'tool_result', iteration: 1, name: 'list_envs', result: 'list_envs done', isError: false },
				{ type: 'text_chunk', content: 'You have base.' },
			]);
			expect(events[4]).toMatchObject({
				type: 'shutdown',
				outcomes: [{ serverId: 'conda', outcome: { status: 'graceful' } }],
			});
			expect(conda().closeCalls).toBe(1);
			expect(manager.getHandles()).toEqual([]);
			expect(session.getMessages()).toEqual([
				SYSTEM,
				{ role: 'user', content: 'which envs?' },
				{
					role: 'assistant',
					content:
						'\n|TOOL PREDICTION|:\nTool: `list_envs`\nParameters:\n```json\n{}\n```\n' +
						'\n|TOOL RESULT|:\nTool: `list_envs`\nResult: list_envs done\n' +
						'\n|FINAL RESPONSE|:\nYou have base.',
				},
			]);
		});

		it('should give the agent the conversation so far', async () => {
			const client = new ScriptedClient([text('Done.')], ['Hi']);
			const session = new ChatSession({ client, manager, config, logger });
			await collect(session.run('hello'));
			session.setMode('agent');

			await collect(session.run('now use tools'));

			expect(client.requests[0]?.messages).toEqual([
				SYSTEM,
				{ role: 'user', content: 'hello' },
				{ role: 'assistant', content: 'Hi' },
				{ role: 'user', content: 'now use tools' },
			]);
		});

		it('should close servers when the agent fails', async () => {
			const client = new ScriptedClient([new Error('Rate limit reached')]);
			const session = new ChatSession({ client, manager, config, logger, mode: 'agent' });

			const events = await collect(session.run('which envs?'));

			expect(events.map(event => event.type)).toEqual(['connection', 'error', 'shutdown']);
			expect(events[1]).toEqual({ type: 'error', content: 'Rate limit reached' });
			expect(conda().closeCalls).toBe(1);
			expect(manager.getHandles()).toEqual([]);
			expect(session.getMessages()).toEqual([
				SYSTEM,
				{ role: 'user', content: 'which envs?' },
				{ role: 'assistant', content: 'Error: Rate limit reached' },
			]);
		});

		it('should close servers when the caller stops reading', async () => {
			const client = new ScriptedClient([text('unused')]);
			const session = new ChatSession({ client, manager, config, logger, mode: 'agent' });

			for await (const event of session.run('which envs?')) {
				expect(event.type).toBe('connection');
				break;
			}

			expect(conda().closeCalls).toBe(1);
			expect(manager.getHandles()).toEqual([]);
		});

		it('should fail the turn when a strict server cannot connect', async () => {
			setup({ startError: new Error('uv: not found') });
			const client = new ScriptedClient([text('unused')]);
			const session = new ChatSession({ client, manager, config, logger, mode: 'agent', strict: true });

			const events = await collect(session.run('which envs?'));

			expect(events).toEqual([
				{
					type: 'error',
					content: 'Failed to connect to required strict servers: conda (LaunchFailure: conda)',
				},
				{ type: 'shutdown', outcomes: [] },
			]);
			expect(client.requests).toEqual([]);
		});

		it('should continue without servers that fail in lenient mode', async () => {
			setup({ startError: new Error('uv: not found') });
			const client = new ScriptedClient([text('No tools available.')]);
			const session = new ChatSession({ client, manager, config, logger, mode: 'agent' });

			const events = await collect(session.run('which envs?'));

			expect(events[0]).toEqual({
				type: 'connection',
				connected: [],
				failed: { conda: 'uv: not found' },
				skipped: [],
			});
			expect(client.requests[0]?.tools).toEqual([]);
		});
	});

	it('should log errors', async () => {
		const errorSpy = vi.spyOn(logger, 'error');
		const session = new ChatSession({
			client: new ScriptedClient([], [new Error('boom')]),
			manager,
			config,
			logger,
		});

		await collect(session.run('hello'));

		expect(errorSpy).toHaveBeenCalledWith('[Session] Error in chat mode: boom');
		errorSpy.mockRestore();
	});
});
