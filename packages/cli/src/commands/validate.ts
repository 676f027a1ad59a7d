/**
 * logwire validate — Validate the configuration file.
 *
 * Checks YAML syntax, the schema, cross-field rules, environment
 * substitution and every sink's config, then prints the resolved values.
 */

import type { LogwireConfig } from '@logwire/core';
import { brokerUrl, errorMessage, SchemaError } from '@logwire/core';
import type { Command } from 'commander';
import { fileExists, globalConfigPath, loadCliConfig, resolveConfigPath } from '../config.js';
import * as output from '../output.js';
import { checkSinks } from '../sinks.js';

// ─── Validation result ───────────────────────────────────────────────────────

export interface ValidationResult {
	file: string;
	valid: boolean;
	errors: string[];
	config?: LogwireConfig;
}

function describeError(err: unknown): string[] {
	if (err instanceof SchemaError) {
		return [err.message, ...err.validationErrors];
	}
	return [errorMessage(err)];
}

export async function runValidation(configPath: string, env?: NodeJS.ProcessEnv): Promise<ValidationResult> {
	try {
		const config = await loadCliConfig({ configPath, env });
		checkSinks(config.sinks);
		return { file: configPath, valid: true, errors: [], config };
	} catch (err) {
		return { file: configPath, valid: false, errors: describeError(err) };
	}
}

function printConfig(config: LogwireConfig): void {
	const { pipeline } = config;
	output.keyValues([
		['broker', brokerUrl(pipeline)],
		['topic', pipeline.topic],
		['qos', pipeline.qos],
		['retain', pipeline.retain],
		['queue', `${pipeline.queueCapacity} (${pipeline.overflow})`],
		['batch size', pipeline.batchSize],
		['max retries', pipeline.maxRetries],
		['backoff', `${pipeline.backoffBase}ms..${pipeline.backoffCap}ms`],
		['level', config.level],
		['sinks', config.sinks.map((s) => s.type).join(', ') || '(none)'],
	]);
}

// ─── Command registration ────────────────────────────────────────────────────

export function registerValidateCommand(program: Command): void {
	program
		.command('validate')
		.description('Validate the configuration file')
		.action(async (_opts, cmd: Command) => {
			const configPath = resolveConfigPath(globalConfigPath(cmd));

			if (!(await fileExists(configPath))) {
				output.error(`Configuration file not found: ${configPath}`);
				process.exitCode = 1;
				return;
			}

			const result = await runValidation(configPath);

			if (output.isJsonMode()) {
				output.json(result);
			} else if (result.config) {
				output.success(`${result.file} is valid`);
				output.blank();
				printConfig(result.config);
			} else {
				output.error(`${result.file} is invalid`);
				for (const err of result.errors) {
					output.error(`  ${err}`);
				}
			}

			if (!result.valid) process.exitCode = 1;
		});
}
