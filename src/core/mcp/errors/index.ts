/**
 * Tool server error classes and utilities.
 */

export {
	ToolServerError,
	AlreadyConnectedError,
	ConnectTimeoutError,
	LaunchFailureError,
	NotConnectedError,
	RemoteError,
	SideChannelFailureError,
	TransportError,
	ShutdownTimeoutError,
	InvalidStateTransitionError,
	ConfigurationError,
	ToolServerErrorUtils,
} from './connection-errors.js';
export type { ToolServerErrorKind } from './connection-errors.js';
