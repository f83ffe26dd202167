import { Assistant } from '../../../core/brain/agent/agent.js';
import { AgentConfigSchema } from '../../../core/brain/agent/config.js';
import { ConnectionManager } from '../../../core/mcp/manager.js';
import { createLogger } from '../../../core/logger/index.js';
import type { SessionMode } from '../../../core/session/chat-session.js';
import type { ShellResult, ShellRunner } from '../../../core/session/shell.js';
import { fakeTransportFactory } from '../../../core/mcp/__test__/fake-transport.js';
import { ScriptedClient } from '../../../core/brain/reasoning/__test__/scripted-client.js';

export const silentLogger = createLogger({ silent: true });

export class StaticShell implements ShellRunner {
	readonly commands: string[] = [];

	constructor(private readonly result: ShellResult) {}

	async run(command: string): Promise<ShellResult> {
		this.commands.push(command);
		return this.result;
	}
}

export function createAssistant(
	options: { client?: ScriptedClient; shell?: ShellRunner; mode?: SessionMode } = {}
): Assistant {
	const config = AgentConfigSchema.parse({
		systemPrompt: 'Prefer conda over pip.',
		mcpServers: {
			conda: { type: 'stdio', command: 'fake-server' },
			jupyter: { type: 'container', image: 'jupyter-mcp:test', enabled: false },
		},
	});
	const fake = fakeTransportFactory({ conda: {} });
	return new Assistant(config, {
		client: options.client ?? new ScriptedClient(),
		manager: new ConnectionManager({ transportFactory: fake.factory, logger: silentLogger }),
		logger: silentLogger,
		...(options.shell ? { shell: options.shell } : {}),
		...(options.mode ? { mode: options.mode } : {}),
	});
}
