/**
 * Container launch helpers.
 *
 * A container server is run through the runtime CLI as a stdio server:
 *
 *   docker run -i --rm --name <unique> -e KEY ... <runArgs> <image> <args>
 *
 * Values of forwarded variables are set on the runtime CLI's own environment,
 * never on its command line. The unique name is what lets a stuck container be
 * removed with `docker rm -f`.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../../logger/index.js';
import type { ContainerServerConfig } from '../config.js';
import { CLIENT_INFO } from '../constants.js';

const execFileAsync = promisify(execFile);

export interface ContainerLaunch {
	command: string;
	args: string[];
	containerName: string;
}

export function createContainerName(serverId: string): string {
	const safeId = serverId.toLowerCase().replace(/[^a-z0-9_.-]/g, '-');
	return `${CLIENT_INFO.name}-${safeId}-${uuidv4().slice(0, 8)}`;
}

export function buildContainerLaunch(
	config: ContainerServerConfig,
	containerName: string
): ContainerLaunch {
	const envFlags = Object.keys(config.env).flatMap(name => ['-e', name]);

	return {
		command: config.runtime,
		args: [
			'run',
			'-i',
			'--rm',
			'--name',
			containerName,
			...envFlags,
			...config.runArgs,
			config.image,
			...config.args,
		],
		containerName,
	};
}

/**
 * Graceful stop. A container that is already gone counts as stopped.
 */
export async function stopContainer(runtime: string, containerName: string): Promise<void> {
	try {
		await execFileAsync(runtime, ['stop', containerName]);
	} catch (error) {
		if (isMissingContainer(error)) return;
		throw error;
	}
}

/**
 * Forced removal. Returns immediately; the outcome is only logged.
 */
export function removeContainer(runtime: string, containerName: string, logger: Logger): void {
	const child = execFile(runtime, ['rm', '-f', containerName], error => {
		if (error && !isMissingContainer(error)) {
			logger.warn(`Failed to remove container ${containerName}: ${error.message}`);
			return;
		}
		logger.debug(`Removed container ${containerName}`);
	});
	child.unref();
}

function isMissingContainer(error: unknown): boolean {
	const stderr =
		typeof error === 'object' && error !== null && 'stderr' in error ? String(error.stderr) : '';
	const message = error instanceof Error ? error.message : '';
	return /no such container/i.test(`${stderr} ${message}`);
}
