export { ToolServerHandle, HANDLE_TRANSITIONS, isTerminalState } from './handle.js';
export { SideChannelMonitor } from './side-channel.js';
export { SdkToolServerTransport, createSdkTransport, mergeEnvironment } from './transport.js';
export {
	buildContainerLaunch,
	createContainerName,
	removeContainer,
	stopContainer,
} from './container.js';

export type { ContainerLaunch } from './container.js';
