import * as path from 'path';
import { existsSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * The default path to the agent config file
 */
export const DEFAULT_CONFIG_PATH = 'agent/nbconda.yml';

/**
 * Directory holding package.json, found by walking up from this module.
 * Works from both the TypeScript sources and the compiled dist/ tree.
 */
export function findPackageRoot(): string {
	let dir = path.dirname(fileURLToPath(import.meta.url));
	while (!existsSync(path.join(dir, 'package.json'))) {
		const parent = path.dirname(dir);
		if (parent === dir) {
			return process.cwd();
		}
		dir = parent;
	}
	return dir;
}

/**
 * Resolve the configuration file path.
 * - If it's absolute, return as-is.
 * - If it's the default config, resolve relative to the package installation root.
 * - Otherwise resolve relative to the current working directory.
 */
export function resolveConfigPath(configPath: string): string {
	if (path.isAbsolute(configPath)) {
		return configPath;
	}

	if (configPath === DEFAULT_CONFIG_PATH) {
		return path.resolve(findPackageRoot(), configPath);
	}

	return path.resolve(process.cwd(), configPath);
}
