export { ChatSession, SESSION_MODES, isSessionMode, nextMode } from './chat-session.js';
export type { ChatSessionOptions, RunOptions, SessionEvent, SessionMode } from './chat-session.js';
export { ExecShellRunner } from './shell.js';
export type { ShellResult, ShellRunOptions, ShellRunner } from './shell.js';
export { AgentTranscript } from './transcript.js';
