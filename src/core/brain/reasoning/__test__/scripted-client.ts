import type {
	ChatMessage,
	CompletionClient,
	CompletionOptions,
	CompletionResponse,
	FunctionTool,
	LLMServiceConfig,
} from '../../llm/services/types.js';

/**
 * Completion client that replays canned responses and records every request.
 */
export class ScriptedClient implements CompletionClient {
	readonly requests: Array<{ messages: ChatMessage[]; tools: FunctionTool[] }> = [];
	readonly streamed: ChatMessage[][] = [];

	constructor(
		private readonly responses: Array<CompletionResponse | Error> = [],
		private readonly chunks: Array<string | Error> = []
	) {}

	async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResponse> {
		this.requests.push({ messages: [...messages], tools: options.tools ?? [] });
		const next = this.responses.shift();
		if (!next) {
			throw new Error('No scripted response left');
		}
		if (next instanceof Error) {
			throw next;
		}
		return next;
	}

	async *stream(messages: ChatMessage[]): AsyncIterable<string> {
		this.streamed.push([...messages]);
		for (const chunk of this.chunks) {
			if (chunk instanceof Error) {
				throw chunk;
			}
			yield chunk;
		}
	}

	getConfig(): LLMServiceConfig {
		return { provider: 'openai', model: 'agent-model', chatModel: 'chat-model' };
	}
}

export function text(content: string): CompletionResponse {
	return { content, toolCalls: [] };
}

export function callTools(
	content: string | null,
	...calls: Array<[id: string, name: string, args: string]>
): CompletionResponse {
	return {
		content,
		toolCalls: calls.map(([id, name, args]) => ({ id, name, arguments: args })),
	};
}
