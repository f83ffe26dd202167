import { RemoteError } from '../../mcp/errors/index.js';
import type { ExposedTool, ToolInvocationResult } from '../../mcp/types.js';
import type { FunctionTool } from '../llm/services/types.js';

export const EMPTY_RESULT_TEXT = 'Tool completed with no output.';

export function toFunctionTools(tools: ExposedTool[]): FunctionTool[] {
	return tools.map((tool): FunctionTool => ({
		type: 'function',
		function: {
			name: tool.exposedName,
			description: tool.description,
			parameters: tool.inputSchema,
		},
	}));
}

/**
 * Error body sent back to the model in place of a tool result.
 */
export function toolErrorBody(kind: string, message: string, payload?: unknown): string {
	return JSON.stringify({
		error: { kind, message, ...(payload !== undefined ? { payload } : {}) },
	});
}

/**
 * Text the model receives for a tool call. Failures keep their kind and any
 * payload the server sent; diagnostics from the side channel are appended to
 * successful output so the model can see them too.
 */
export function serializeToolResult(result: ToolInvocationResult): string {
	if (!result.ok) {
		const { error } = result;
		return toolErrorBody(
			error.kind,
			error.message,
			error instanceof RemoteError ? error.payload : undefined
		);
	}

	let text = result.content
		.map(block => (block.type === 'text' ? block.text : JSON.stringify(block)))
		.join('\n')
		.trim();
	if (!text && result.structuredContent) {
		text = JSON.stringify(result.structuredContent);
	}
	if (!text) {
		text = EMPTY_RESULT_TEXT;
	}

	if (result.diagnostics.length > 0) {
		text += `\n\nServer diagnostics:\n${result.diagnostics.join('\n')}`;
	}
	return text;
}

export type ParsedArguments =
	| { ok: true; value: Record<string, unknown> }
	| { ok: false; message: string };

/**
 * Parse the JSON arguments of a tool call. Blank input means no arguments.
 */
export function parseToolArguments(raw: string): ParsedArguments {
	if (raw.trim() === '') {
		return { ok: true, value: {} };
	}

	let value: unknown;
	try {
		value = JSON.parse(raw);
	} catch (error) {
		return { ok: false, message: error instanceof Error ? error.message : String(error) };
	}

	if (!isRecord(value)) {
		return { ok: false, message: 'Tool arguments must be a JSON object' };
	}
	return { ok: true, value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
