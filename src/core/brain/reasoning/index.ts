export { ReasoningAgent } from './agent.js';
export type { ReasoningAgentOptions, AgentStreamOptions, ToolProvider } from './agent.js';
export type { AgentEvent, AgentEventType } from './events.js';
export {
	toFunctionTools,
	serializeToolResult,
	parseToolArguments,
	toolErrorBody,
	EMPTY_RESULT_TEXT,
} from './tool-formatter.js';
export type { ParsedArguments } from './tool-formatter.js';
