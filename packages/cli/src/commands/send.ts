/**
 * logwire send — ship one record and wait for delivery.
 */

import type { Attributes, LogwireConfig } from '@logwire/core';
import { ConfigError, PipelineRegistry, resolveLevel } from '@logwire/core';
import type { PipelineStats } from '@logwire/sdk';
import type { Command } from 'commander';
import { globalConfigPath, loadCliConfig } from '../config.js';
import * as output from '../output.js';
import { openSession, statsRows, undelivered } from '../session.js';

export interface SendOptions {
	name: string;
	level: string;
	/** `key=value` pairs */
	attributes: string[];
	config: LogwireConfig;
	registry: PipelineRegistry;
}

export interface SendResult {
	/** False when the record was below the configured level or failed to encode */
	sent: boolean;
	stats: PipelineStats;
}

export function parseAttributes(pairs: string[]): Attributes {
	const attributes: Attributes = {};
	for (const pair of pairs) {
		const eq = pair.indexOf('=');
		if (eq <= 0) {
			throw new ConfigError(`Invalid attribute "${pair}": expected key=value`);
		}
		attributes[pair.slice(0, eq)] = pair.slice(eq + 1);
	}
	return attributes;
}

export async function runSend(message: string, options: SendOptions): Promise<SendResult> {
	const level = resolveLevel(options.level);
	const attributes = parseAttributes(options.attributes);

	const session = await openSession(options.registry, options.name, options.config);
	let sent: boolean;
	try {
		sent = session.logger.log(level, message, attributes);
	} catch (err) {
		await session.close();
		throw err;
	}
	return { sent, stats: await session.close() };
}

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

export function registerSendCommand(program: Command): void {
	program
		.command('send')
		.description('Send one log record to the broker')
		.argument('<message>', 'Message text')
		.option('-n, --name <name>', 'Logger name', 'logwire.cli')
		.option('-l, --level <level>', 'Record level', 'INFO')
		.option('-a, --attribute <key=value>', 'Attach an attribute (repeatable)', collect, [])
		.action(async (message: string, opts: { name: string; level: string; attribute: string[] }, cmd: Command) => {
			try {
				const config = await loadCliConfig({ configPath: globalConfigPath(cmd) });
				const registry = new PipelineRegistry();

				const { sent, stats } = await runSend(message, {
					name: opts.name,
					level: opts.level,
					attributes: opts.attribute,
					config,
					registry,
				});

				if (output.isJsonMode()) {
					output.json({ sent, stats });
				} else if (!sent) {
					output.warn(`Record not sent (below level ${config.level} or not encodable)`);
				} else if (undelivered(stats) === 0) {
					output.success(`Delivered to ${config.pipeline.hostname}:${config.pipeline.port}`);
				} else {
					output.error(`Record was not delivered to ${config.pipeline.hostname}:${config.pipeline.port}`);
				}
				output.keyValues(statsRows(stats));

				if (sent && undelivered(stats) > 0) process.exitCode = 1;
			} catch (err) {
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			}
		});
}
