import OpenAI from 'openai';
import { logger } from '../../../logger/index.js';
import { delay } from '../../../mcp/utils/index.js';
import type { LLMConfig } from '../config.js';
import type {
	ChatMessage,
	CompletionClient,
	CompletionOptions,
	CompletionResponse,
	LLMServiceConfig,
	ToolCallRequest,
} from './types.js';

const MAX_ATTEMPTS = 3;

/**
 * Chat completions against the OpenAI API, or any endpoint compatible with it.
 */
export class OpenAIService implements CompletionClient {
	private openai: OpenAI;
	private model: string;
	private chatModel: string;
	private temperature: number;

	constructor(openai: OpenAI, config: Pick<LLMConfig, 'model' | 'chatModel' | 'temperature'>) {
		this.openai = openai;
		this.model = config.model;
		this.chatModel = config.chatModel;
		this.temperature = config.temperature;
	}

	async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResponse> {
		const model = options.model ?? this.model;
		const tools = options.tools ?? [];
		let attempts = 0;

		while (true) {
			attempts++;
			try {
				logger.debug(`[OpenAI] Sending ${messages.length} messages to ${model}`, {
					tools: tools.length,
				});
				const response = await this.openai.chat.completions.create(
					{
						model,
						messages,
						temperature: this.temperature,
						...(tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {}),
					},
					options.signal ? { signal: options.signal } : undefined
				);
				const message = response.choices[0]?.message;
				if (!message) {
					throw new Error('[OpenAI] Received empty message from OpenAI API');
				}
				return {
					content: message.content,
					toolCalls: (message.tool_calls ?? []).map(
						(call): ToolCallRequest => ({
							id: call.id,
							name: call.function.name,
							arguments: call.function.arguments,
						})
					),
				};
			} catch (error) {
				if (attempts >= MAX_ATTEMPTS || !isRetryable(error) || options.signal?.aborted) {
					logger.error(
						`[OpenAI] Failed to get response after ${attempts} attempt(s): ${errorMessage(error)}`
					);
					throw error;
				}
				logger.warn(
					`[OpenAI] Error in OpenAI API call (Attempt ${attempts}/${MAX_ATTEMPTS}): ${errorMessage(error)}`
				);
				await delay(500 * attempts);
			}
		}
	}

	async *stream(messages: ChatMessage[], options: CompletionOptions = {}): AsyncIterable<string> {
		const model = options.model ?? this.chatModel;
		logger.debug(`[OpenAI] Streaming ${messages.length} messages from ${model}`);

		const stream = await this.openai.chat.completions.create(
			{
				model,
				messages,
				temperature: this.temperature,
				stream: true,
			},
			options.signal ? { signal: options.signal } : undefined
		);

		for await (const chunk of stream) {
			const content = chunk.choices[0]?.delta?.content;
			if (content) {
				yield content;
			}
		}
	}

	getConfig(): LLMServiceConfig {
		return {
			provider: 'openai',
			model: this.model,
			chatModel: this.chatModel,
		};
	}
}

/**
 * Rate limits and server-side failures are worth another attempt; other client
 * errors will fail the same way again.
 */
function isRetryable(error: unknown): boolean {
	if (error instanceof OpenAI.APIError) {
		const status = error.status;
		return status === undefined || status === 429 || status >= 500;
	}
	return false;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function createOpenAIService(config: LLMConfig, apiKey: string): OpenAIService {
	const openai = new OpenAI({
		apiKey: config.apiKey || apiKey,
		// complete() runs its own retry loop
		maxRetries: 0,
		...(config.baseURL ? { baseURL: config.baseURL } : {}),
	});
	return new OpenAIService(openai, config);
}
