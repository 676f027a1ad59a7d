/**
 * Configuration loading for the CLI.
 *
 * Loads logwire.yaml from --config or the current directory. Without an
 * explicit --config, a missing file means the built-in defaults.
 */

import { access } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import type { LogwireConfig } from '@logwire/core';
import { ConfigError, DEFAULT_CONFIG_FILE, loadConfig, parseConfig } from '@logwire/core';
import type { Command } from 'commander';

/** The global --config option, as seen from a subcommand */
export function globalConfigPath(cmd: Command): string | undefined {
	const config: unknown = cmd.parent?.opts().config;
	return typeof config === 'string' ? config : undefined;
}

export function resolveConfigPath(configPath?: string): string {
	if (configPath) {
		return isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);
	}
	return resolve(process.cwd(), DEFAULT_CONFIG_FILE);
}

export async function fileExists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
}

export interface CliConfigOptions {
	configPath?: string;
	env?: NodeJS.ProcessEnv;
}

/**
 * Load the configuration the commands run with.
 */
export async function loadCliConfig(options: CliConfigOptions = {}): Promise<LogwireConfig> {
	const configPath = resolveConfigPath(options.configPath);

	if (!(await fileExists(configPath))) {
		if (options.configPath) {
			throw new ConfigError(`Configuration file not found: ${configPath}`);
		}
		return parseConfig('', { env: options.env, source: 'defaults' });
	}

	return loadConfig({ configPath, env: options.env });
}
