import { exec, type ExecException } from 'child_process';

export interface ShellResult {
	stdout: string;
	stderr: string;
	/** `null` when the process was killed by a signal */
	exitCode: number | null;
	timedOut: boolean;
}

export interface ShellRunOptions {
	timeoutMs: number;
	shell?: string;
	signal?: AbortSignal;
}

export interface ShellRunner {
	run(command: string, options: ShellRunOptions): Promise<ShellResult>;
}

const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Runs terminal-mode commands through the system shell. A non-zero exit is
 * still a result; only a failure to start the shell at all rejects.
 */
export class ExecShellRunner implements ShellRunner {
	run(command: string, options: ShellRunOptions): Promise<ShellResult> {
		return new Promise((resolve, reject) => {
			exec(
				command,
				{
					timeout: options.timeoutMs,
					maxBuffer: MAX_BUFFER,
					...(options.shell ? { shell: options.shell } : {}),
					...(options.signal ? { signal: options.signal } : {}),
				},
				(error: ExecException | null, stdout: string, stderr: string) => {
					// Exit statuses are numbers; spawn failures carry a string such as 'ENOENT'
					const code: unknown = error?.code;
					const notStarted =
						typeof code === 'string' || (code === undefined && !stdout && !stderr);
					if (error && !error.killed && notStarted) {
						reject(error);
						return;
					}
					resolve({
						stdout,
						stderr,
						exitCode: error ? (typeof code === 'number' ? code : null) : 0,
						timedOut: error?.killed === true && error.signal === 'SIGTERM',
					});
				}
			);
		});
	}
}
