import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
	buildContainerLaunch,
	createContainerName,
	removeContainer,
	stopContainer,
} from '../connection/container.js';
import { ContainerServerConfigSchema } from '../config.js';
import { createLogger } from '../../logger/index.js';

const exec = vi.hoisted(() => ({
	calls: [] as Array<{ file: string; args: string[] }>,
	error: null as (Error & { stderr?: string }) | null,
	unref: vi.fn(),
}));

vi.mock('child_process', async importOriginal => {
	const actual = await importOriginal<typeof import('child_process')>();
	return {
		...actual,
		execFile: vi.fn(
			(
				file: string,
				args: string[],
				callback: (error: Error | null, stdout: string, stderr: string) => void
			) => {
				exec.calls.push({ file, args });
				callback(exec.error, '', exec.error?.stderr ?? '');
				return { unref: exec.unref };
			}
		),
	};
});

const logger = createLogger({ silent: true });

function missingContainerError(): Error & { stderr: string } {
	return Object.assign(new Error('Command failed: docker stop nbconda-jupyter-0a1b2c3d'), {
		stderr: 'Error response from daemon: No such container: nbconda-jupyter-0a1b2c3d',
	});
}

describe('container launch', () => {
	beforeEach(() => {
		exec.calls.length = 0;
		exec.error = null;
		exec.unref.mockClear();
	});

	it('should build a run command that forwards env names only', () => {
		const config = ContainerServerConfigSchema.parse({
			type: 'container',
			image: 'datalayer/jupyter-mcp-server:latest',
			env: { SERVER_URL: 'http://host.docker.internal:8888', TOKEN: 'test-secret' },
			runArgs: ['--network=host'],
		});

		const launch = buildContainerLaunch(config, 'nbconda-jupyter-0a1b2c3d');

		expect(launch).toEqual({
			command: 'docker',
			args: [
				'run',
				'-i',
				'--rm',
				'--name',
				'nbconda-jupyter-0a1b2c3d',
				'-e',
				'SERVER_URL',
				'-e',
				'TOKEN',
				'--network=host',
				'datalayer/jupyter-mcp-server:latest',
			],
			containerName: 'nbconda-jupyter-0a1b2c3d',
		});
		expect(launch.args).not.toContain('test-secret');
	});

	it('should use the configured runtime and pass image arguments last', () => {
		const config = ContainerServerConfigSchema.parse({
			type: 'container',
			image: 'example/server:1.0',
			runtime: '/usr/local/bin/podman',
			args: ['--transport', 'stdio'],
		});

		const launch = buildContainerLaunch(config, 'name');

		expect(launch.command).toBe('/usr/local/bin/podman');
		expect(launch.args.slice(-3)).toEqual(['example/server:1.0', '--transport', 'stdio']);
	});

	it('should create unique, runtime-safe container names', () => {
		const first = createContainerName('Jupyter Server');
		const second = createContainerName('Jupyter Server');

		expect(first).toMatch(/^nbconda-jupyter-server-[0-9a-f]{8}$/);
		expect(first).not.toBe(second);
	});

	it('should stop a container by name', async () => {
		await stopContainer('docker', 'nbconda-jupyter-0a1b2c3d');

		expect(exec.calls).toEqual([{ file: 'docker', args: ['stop', 'nbconda-jupyter-0a1b2c3d'] }]);
	});

	it('should treat a container that is already gone as stopped', async () => {
		exec.error = missingContainerError();

		await expect(stopContainer('docker', 'nbconda-jupyter-0a1b2c3d')).resolves.toBeUndefined();
	});

	it('should propagate other stop failures', async () => {
		exec.error = Object.assign(new Error('Cannot connect to the Docker daemon'), { stderr: '' });

		await expect(stopContainer('docker', 'nbconda-jupyter-0a1b2c3d')).rejects.toThrow(
			'Cannot connect to the Docker daemon'
		);
	});

	it('should force-remove without waiting for the runtime', () => {
		removeContainer('docker', 'nbconda-jupyter-0a1b2c3d', logger);

		expect(exec.calls).toEqual([
			{ file: 'docker', args: ['rm', '-f', 'nbconda-jupyter-0a1b2c3d'] },
		]);
		expect(exec.unref).toHaveBeenCalledTimes(1);
	});
});
