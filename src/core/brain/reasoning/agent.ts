import { logger as defaultLogger, type Logger } from '../../logger/index.js';
import type { ExposedTool, InvokeOptions, ToolInvocationResult } from '../../mcp/types.js';
import type { AssistantToolCall, ChatMessage, CompletionClient } from '../llm/services/types.js';
import type { AgentEvent } from './events.js';
import {
	parseToolArguments,
	serializeToolResult,
	toFunctionTools,
	toolErrorBody,
} from './tool-formatter.js';

/**
 * Where the agent gets its tools. `ConnectionManager` satisfies this.
 */
export interface ToolProvider {
	listTools(): ExposedTool[];
	invokeTool(
		exposedName: string,
		args?: Record<string, unknown>,
		options?: InvokeOptions
	): Promise<ToolInvocationResult>;
}

export interface ReasoningAgentOptions {
	client: CompletionClient;
	tools: ToolProvider;
	maxIterations?: number;
	logger?: Logger;
}

export interface AgentStreamOptions {
	signal?: AbortSignal;
}

const DEFAULT_MAX_ITERATIONS = 10;

/**
 * Tool-calling loop over a completion client. Each round asks the model for a
 * completion with the current tool catalogue; tool calls are run through the
 * provider and their results (including failures) fed back, until the model
 * answers in plain text or the iteration limit is reached.
 */
export class ReasoningAgent {
	private client: CompletionClient;
	private tools: ToolProvider;
	private maxIterations: number;
	private logger: Logger;

	constructor(options: ReasoningAgentOptions) {
		this.client = options.client;
		this.tools = options.tools;
		this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
		this.logger = options.logger ?? defaultLogger;
	}

	async *stream(
		messages: ChatMessage[],
		options: AgentStreamOptions = {}
	): AsyncGenerator<AgentEvent, void, undefined> {
		const history: ChatMessage[] = [...messages];
		const tools = toFunctionTools(this.tools.listTools());
		const invokeOptions: InvokeOptions = options.signal ? { signal: options.signal } : {};
		this.logger.debug(`[Agent] Starting with ${tools.length} tool(s)`);

		for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
			const response = await this.client.complete(history, {
				tools,
				...(options.signal ? { signal: options.signal } : {}),
			});

			if (response.toolCalls.length === 0) {
				const text = response.content ?? '';
				if (text) {
					yield { type: 'text_chunk', content: text };
				}
				return;
			}

			const thought = response.content?.trim();
			if (thought) {
				this.logger.debug(`[Agent] Iteration ${iteration}: ${thought}`);
				yield { type: 'thinking', iteration, content: thought };
			}

			history.push({
				role: 'assistant',
				content: response.content,
				tool_calls: response.toolCalls.map((call): AssistantToolCall => ({
					id: call.id,
					type: 'function',
					function: { name: call.name, arguments: call.arguments },
				})),
			});

			for (const call of response.toolCalls) {
				const parsed = parseToolArguments(call.arguments);
				if (!parsed.ok) {
					const message = `Invalid arguments for tool '${call.name}': ${parsed.message}`;
					this.logger.warn(`[Agent] ${message}`);
					yield { type: 'error', content: message };
					history.push({
						role: 'tool',
						tool_call_id: call.id,
						content: toolErrorBody('InvalidArguments', message),
					});
					continue;
				}

				yield { type: 'tool_prediction', iteration, name: call.name, arguments: parsed.value };

				const result = await this.tools.invokeTool(call.name, parsed.value, invokeOptions);
				const content = serializeToolResult(result);
				yield { type: 'tool_result', iteration, name: call.name, result: content, isError: !result.ok };
				history.push({ role: 'tool', tool_call_id: call.id, content });
			}
		}

		this.logger.warn(`[Agent] Reached maximum iterations (${this.maxIterations}) for task.`);
		yield {
			type: 'error',
			content: `Reached the maximum of ${this.maxIterations} tool-calling iterations without a final answer`,
		};
	}
}
