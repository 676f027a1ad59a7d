/**
 * Resolve the `sinks:` section of logwire.yaml into initialized sinks.
 */

import type { SinkDefinition } from '@logwire/core';
import { ConfigError, createSink, validateSinkConfig } from '@logwire/core';
import type { Sink, SinkRegistration } from '@logwire/sdk';
import { register as registerConsole } from '@logwire/sink-console';
import { register as registerFile } from '@logwire/sink-file';

const BUILTIN_SINKS: SinkRegistration[] = [registerConsole(), registerFile()];

export function availableSinkTypes(): string[] {
	return BUILTIN_SINKS.map((r) => r.id);
}

export function findSinkRegistration(type: string): SinkRegistration {
	const registration = BUILTIN_SINKS.find((r) => r.id === type);
	if (!registration) {
		throw new ConfigError(`Unknown sink type "${type}". Available: ${availableSinkTypes().join(', ')}`);
	}
	return registration;
}

/** Check every definition without creating anything */
export function checkSinks(definitions: SinkDefinition[]): void {
	for (const definition of definitions) {
		validateSinkConfig(findSinkRegistration(definition.type), definition.config);
	}
}

/**
 * Build every sink in order. The file sink's default file name uses the
 * logger name unless the config gives a name or a path.
 */
export async function resolveSinks(definitions: SinkDefinition[], loggerName: string): Promise<Sink[]> {
	const sinks: Sink[] = [];
	try {
		for (const definition of definitions) {
			const registration = findSinkRegistration(definition.type);
			const config =
				registration.id === 'file' && definition.config.name === undefined && definition.config.path === undefined
					? { ...definition.config, name: loggerName }
					: definition.config;
			sinks.push(await createSink(registration, config));
		}
	} catch (err) {
		await Promise.allSettled(sinks.map((s) => s.shutdown()));
		throw err;
	}
	return sinks;
}
