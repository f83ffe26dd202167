import type OpenAI from 'openai';

export type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
export type FunctionTool = OpenAI.Chat.Completions.ChatCompletionTool;
export type AssistantToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;

export interface ToolCallRequest {
	id: string;
	name: string;
	/** Raw JSON text as produced by the model */
	arguments: string;
}

export interface CompletionResponse {
	content: string | null;
	toolCalls: ToolCallRequest[];
}

export interface CompletionOptions {
	tools?: FunctionTool[];
	/** Overrides the configured model for this request */
	model?: string;
	signal?: AbortSignal;
}

/**
 * The slice of a model provider the agent and chat session need: one
 * tool-aware completion and one streamed text completion.
 */
export interface CompletionClient {
	complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResponse>;
	stream(messages: ChatMessage[], options?: CompletionOptions): AsyncIterable<string>;
	getConfig(): LLMServiceConfig;
}

export type LLMServiceConfig = {
	provider: string;
	model: string;
	chatModel: string;
};
