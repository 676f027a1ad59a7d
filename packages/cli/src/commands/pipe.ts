/**
 * logwire pipe — forward each line of stdin as a record.
 *
 * Reads until end of input (or SIGINT/SIGTERM), then shuts the pipeline down
 * with one bounded final drain.
 */

import { createInterface } from 'node:readline';
import type { LogwireConfig } from '@logwire/core';
import { PipelineMetrics, PipelineRegistry, resolveLevel } from '@logwire/core';
import type { PipelineStats } from '@logwire/sdk';
import type { Command } from 'commander';
import { globalConfigPath, loadCliConfig } from '../config.js';
import * as output from '../output.js';
import { openSession, statsRows, undelivered } from '../session.js';

export interface PipeOptions {
	name: string;
	level: string;
	config: LogwireConfig;
	registry: PipelineRegistry;
	input: NodeJS.ReadableStream;
	/** Stop reading early */
	signal?: AbortSignal;
}

export interface PipeResult {
	/** Non-empty lines read */
	lines: number;
	/** Lines handed to the pipeline */
	sent: number;
	stats: PipelineStats;
}

export async function runPipe(options: PipeOptions): Promise<PipeResult> {
	const level = resolveLevel(options.level);
	const session = await openSession(options.registry, options.name, options.config);

	const lines = createInterface({ input: options.input, crlfDelay: Number.POSITIVE_INFINITY });
	const stop = () => lines.close();
	options.signal?.addEventListener('abort', stop, { once: true });

	let read = 0;
	let sent = 0;
	try {
		for await (const line of lines) {
			if (line.length === 0) continue;
			read++;
			if (session.logger.log(level, line)) sent++;
		}
	} catch (err) {
		await session.close();
		throw err;
	} finally {
		options.signal?.removeEventListener('abort', stop);
	}

	return { lines: read, sent, stats: await session.close() };
}

function parsePort(value: string): number {
	const port = Number.parseInt(value, 10);
	if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
		throw new Error(`Invalid port: "${value}"`);
	}
	return port;
}

export function registerPipeCommand(program: Command): void {
	program
		.command('pipe')
		.description('Forward each line of stdin to the broker')
		.option('-n, --name <name>', 'Logger name', 'logwire.pipe')
		.option('-l, --level <level>', 'Level for every line', 'INFO')
		.option('--metrics-port <port>', 'Serve Prometheus metrics on this port while running', parsePort)
		.action(async (opts: { name: string; level: string; metricsPort?: number }, cmd: Command) => {
			const controller = new AbortController();
			const onSignal = () => controller.abort();
			process.once('SIGINT', onSignal);
			process.once('SIGTERM', onSignal);

			let metrics: PipelineMetrics | undefined;
			try {
				const config = await loadCliConfig({ configPath: globalConfigPath(cmd) });
				if (opts.metricsPort !== undefined) {
					metrics = new PipelineMetrics({ collectDefaults: true });
					const port = await metrics.start({ port: opts.metricsPort });
					output.info(`Metrics on http://localhost:${port}/metrics`);
				}
				const registry = new PipelineRegistry({ metrics });

				const { lines, sent, stats } = await runPipe({
					name: opts.name,
					level: opts.level,
					config,
					registry,
					input: process.stdin,
					signal: controller.signal,
				});

				if (output.isJsonMode()) {
					output.json({ lines, sent, stats });
				} else {
					output.info(`Read ${lines} line(s), sent ${sent}`);
					output.keyValues(statsRows(stats));
				}
				if (undelivered(stats) > 0) process.exitCode = 1;
			} catch (err) {
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			} finally {
				process.off('SIGINT', onSignal);
				process.off('SIGTERM', onSignal);
				await metrics?.stop();
			}
		});
}
