/**
 * One logger over one pipeline, for the lifetime of a command.
 */

import type { LogHandle, LogwireConfig, PipelineRegistry } from '@logwire/core';
import { createLogger } from '@logwire/core';
import type { PipelineStats } from '@logwire/sdk';
import { resolveSinks } from './sinks.js';

export interface LoggerSession {
	logger: LogHandle;
	/** Shut the sinks and the pipeline down; returns the final statistics */
	close(): Promise<PipelineStats>;
}

export async function openSession(
	registry: PipelineRegistry,
	name: string,
	config: LogwireConfig,
): Promise<LoggerSession> {
	const sinks = await resolveSinks(config.sinks, name);
	const logger = createLogger(registry, name, {
		level: config.level,
		pipeline: config.pipeline,
		sinks,
	});

	return {
		logger,
		async close() {
			await logger.shutdown();
			await registry.shutdown(name);
			return logger.pipeline.stats();
		},
	};
}

/** Human summary rows for the final statistics */
export function statsRows(stats: PipelineStats): Array<[string, number]> {
	return [
		['accepted', stats.accepted],
		['published', stats.published],
		['dropped (overflow)', stats.droppedOverflow],
		['dropped (encoding)', stats.droppedEncoding],
		['dropped (delivery)', stats.droppedDelivery],
		['connect failures', stats.connectFailures],
	];
}

/** Records that were accepted but never reached the broker */
export function undelivered(stats: PipelineStats): number {
	return stats.accepted - stats.published;
}
