/**
 * Events yielded by `ReasoningAgent.stream`, in the order they happen.
 */
export type AgentEvent =
	| { type: 'thinking'; iteration: number; content: string }
	| { type: 'tool_prediction'; iteration: number; name: string; arguments: Record<string, unknown> }
	| { type: 'tool_result'; iteration: number; name: string; result: string; isError: boolean }
	| { type: 'error'; content: string }
	| { type: 'text_chunk'; content: string };

export type AgentEventType = AgentEvent['type'];
