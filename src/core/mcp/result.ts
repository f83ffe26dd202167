/**
 * Classification of tool-call responses.
 *
 * A response is a failure when the server says so (`isError: true`), when it is
 * not a tool result at all, or when it is empty while the server printed errors
 * on its side channel. Silence alone is never read as success-with-errors.
 */

import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { ERROR_MESSAGES } from './constants.js';
import { RemoteError, SideChannelFailureError, type ToolServerError } from './errors/index.js';
import type { ContentBlock } from './types.js';

const MAX_MESSAGE_LENGTH = 500;

export type ClassifiedResult =
	| {
			ok: true;
			content: ContentBlock[];
			structuredContent?: Record<string, unknown>;
			isEmpty: boolean;
			diagnostics: string[];
	  }
	| { ok: false; error: ToolServerError };

export interface ClassifyContext {
	serverId: string;
	toolName: string;
	/** Error-level side-channel lines recorded while the call was in flight */
	sideChannelErrors: string[];
}

export function classifyCallResult(raw: unknown, context: ClassifyContext): ClassifiedResult {
	const { serverId, toolName, sideChannelErrors } = context;

	const legacy = readLegacyResult(raw);
	if (legacy) {
		return success(legacy, undefined, sideChannelErrors, context);
	}

	const parsed = CallToolResultSchema.safeParse(raw);
	if (!parsed.success) {
		if (sideChannelErrors.length > 0) {
			return {
				ok: false,
				error: new SideChannelFailureError(
					serverId,
					toolName,
					sideChannelErrors,
					`${ERROR_MESSAGES.SIDE_CHANNEL_FAILURE}: ${lastLine(sideChannelErrors)}`
				),
			};
		}
		return {
			ok: false,
			error: new RemoteError(`Server returned a malformed tool result for '${toolName}'`, serverId, toolName, {
				data: raw,
			}),
		};
	}

	const result = parsed.data;
	if (result.isError) {
		const text = textOf(result.content);
		return {
			ok: false,
			error: new RemoteError(text || ERROR_MESSAGES.REMOTE_ERROR, serverId, toolName, {
				content: result.content,
				...(result.structuredContent ? { structuredContent: result.structuredContent } : {}),
				...(sideChannelErrors.length > 0 ? { sideChannel: sideChannelErrors } : {}),
			}),
		};
	}

	return success(result.content, result.structuredContent, sideChannelErrors, context);
}

function success(
	content: ContentBlock[],
	structuredContent: Record<string, unknown> | undefined,
	sideChannelErrors: string[],
	context: ClassifyContext
): ClassifiedResult {
	const isEmpty = isEmptyContent(content) && structuredContent === undefined;

	if (isEmpty && sideChannelErrors.length > 0) {
		return {
			ok: false,
			error: new SideChannelFailureError(
				context.serverId,
				context.toolName,
				sideChannelErrors,
				`Empty result while the server reported errors: ${lastLine(sideChannelErrors)}`
			),
		};
	}

	return {
		ok: true,
		content,
		...(structuredContent ? { structuredContent } : {}),
		isEmpty,
		diagnostics: sideChannelErrors,
	};
}

/**
 * `{ toolResult }` envelopes from older servers. Depending on how the response
 * was parsed they may also carry an empty `content` array.
 */
function readLegacyResult(raw: unknown): ContentBlock[] | null {
	if (typeof raw !== 'object' || raw === null || !('toolResult' in raw)) {
		return null;
	}
	if ('content' in raw && Array.isArray(raw.content) && raw.content.length > 0) {
		return null;
	}

	const value = raw.toolResult;
	if (value === undefined || value === null || value === '') {
		return [];
	}
	return [{ type: 'text', text: typeof value === 'string' ? value : JSON.stringify(value) }];
}

export function isEmptyContent(content: ContentBlock[]): boolean {
	return content.every(block => block.type === 'text' && block.text.trim() === '');
}

/**
 * Joined text of all text blocks, truncated for use in an error message.
 */
export function textOf(content: ContentBlock[]): string {
	const text = content
		.flatMap(block => (block.type === 'text' ? [block.text] : []))
		.join('\n')
		.trim();
	return text.length > MAX_MESSAGE_LENGTH ? `${text.slice(0, MAX_MESSAGE_LENGTH)}...` : text;
}

function lastLine(lines: string[]): string {
	return lines[lines.length - 1] ?? '';
}
