/**
 * Pipeline configuration: defaults, JSON Schema validation, and resolution
 * of caller input into an immutable PipelineConfig.
 */

import type {
	DurationString,
	PipelineConfig,
	PipelineConfigInput,
	ProtocolVersion,
	QoS,
} from '@logwire/sdk';
import { parseDuration } from '@logwire/sdk';
import type { ErrorObject } from 'ajv';
import AjvModule from 'ajv';
import { ConfigError, SchemaError } from './errors.js';

const Ajv = AjvModule.default ?? AjvModule;

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = Object.freeze({
	hostname: 'localhost',
	port: 1884,
	topic: 'logs/{loggerPath}',
	qos: 1,
	retain: true,
	queueCapacity: 1000,
	batchSize: 50,
	maxRetries: 3,
	backoffBase: 500,
	backoffCap: 30_000,
	overflow: 'drop_oldest',
	flushInterval: 1000,
	shutdownTimeout: 5000,
	connectTimeout: 10_000,
	keepalive: 60,
	clientId: '',
	protocolVersion: 4,
	transport: 'tcp',
});

// ─── JSON Schema ──────────────────────────────────────────────────────────────

const durationSchema = {
	oneOf: [
		{ type: 'number', minimum: 0 },
		{ type: 'string', pattern: '^\\d+(ms|s|m|h|d)$' },
	],
};

export const pipelineConfigSchema = {
	type: 'object',
	properties: {
		hostname: { type: 'string', minLength: 1 },
		port: { type: 'integer', minimum: 1, maximum: 65535 },
		topic: { type: 'string', minLength: 1 },
		qos: { enum: [0, 1, 2] },
		retain: { type: 'boolean' },
		queueCapacity: { type: 'integer', minimum: 1 },
		batchSize: { type: 'integer', minimum: 1 },
		maxRetries: { type: 'integer', minimum: 0 },
		backoffBase: durationSchema,
		backoffCap: durationSchema,
		overflow: { enum: ['drop_oldest', 'drop_newest'] },
		flushInterval: durationSchema,
		shutdownTimeout: durationSchema,
		connectTimeout: durationSchema,
		keepalive: durationSchema,
		clientId: { type: 'string' },
		protocolVersion: { enum: [3, 4, 5] },
		transport: { enum: ['tcp', 'websockets'] },
		will: {
			type: 'object',
			required: ['topic', 'payload', 'qos', 'retain'],
			properties: {
				topic: { type: 'string', minLength: 1 },
				payload: { type: 'string' },
				qos: { enum: [0, 1, 2] },
				retain: { type: 'boolean' },
			},
			additionalProperties: false,
		},
	},
	additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateInput = ajv.compile<PipelineConfigInput>(pipelineConfigSchema);

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
	return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

// ─── Resolution ───────────────────────────────────────────────────────────────

function toMillis(value: number | DurationString | undefined, fallback: number): number {
	if (value === undefined) return fallback;
	return typeof value === 'number' ? value : parseDuration(value);
}

/** Keep-alive is expressed in seconds; duration strings are converted. */
function toSeconds(value: number | DurationString | undefined, fallback: number): number {
	if (value === undefined) return fallback;
	return typeof value === 'number' ? value : Math.round(parseDuration(value) / 1000);
}

function isQoS(value: number): value is QoS {
	return value === 0 || value === 1 || value === 2;
}

function isProtocolVersion(value: number): value is ProtocolVersion {
	return value === 3 || value === 4 || value === 5;
}

/**
 * Validate caller input and merge it over the defaults.
 *
 * Throws SchemaError when the shape is wrong and ConfigError when fields
 * disagree with each other (batchSize above queueCapacity, backoffBase
 * above backoffCap, zero flush interval).
 */
export function resolvePipelineConfig(input: unknown = {}): PipelineConfig {
	if (!validateInput(input)) {
		throw new SchemaError('Invalid pipeline configuration', formatSchemaErrors(validateInput.errors));
	}

	const d = DEFAULT_PIPELINE_CONFIG;
	const qos = input.qos ?? d.qos;
	const protocolVersion = input.protocolVersion ?? d.protocolVersion;
	if (!isQoS(qos) || !isProtocolVersion(protocolVersion)) {
		throw new ConfigError(`Invalid qos (${qos}) or protocolVersion (${protocolVersion})`);
	}

	const config: PipelineConfig = {
		hostname: input.hostname ?? d.hostname,
		port: input.port ?? d.port,
		topic: input.topic ?? d.topic,
		qos,
		retain: input.retain ?? d.retain,
		queueCapacity: input.queueCapacity ?? d.queueCapacity,
		batchSize: input.batchSize ?? d.batchSize,
		maxRetries: input.maxRetries ?? d.maxRetries,
		backoffBase: toMillis(input.backoffBase, d.backoffBase),
		backoffCap: toMillis(input.backoffCap, d.backoffCap),
		overflow: input.overflow ?? d.overflow,
		flushInterval: toMillis(input.flushInterval, d.flushInterval),
		shutdownTimeout: toMillis(input.shutdownTimeout, d.shutdownTimeout),
		connectTimeout: toMillis(input.connectTimeout, d.connectTimeout),
		keepalive: toSeconds(input.keepalive, d.keepalive),
		clientId: input.clientId ?? d.clientId,
		protocolVersion,
		transport: input.transport ?? d.transport,
		...(input.will ? { will: Object.freeze({ ...input.will }) } : {}),
	};

	// Default batch size may exceed a small explicit capacity; clamp only then
	if (input.batchSize === undefined && config.batchSize > config.queueCapacity) {
		return resolvePipelineConfig({ ...input, batchSize: config.queueCapacity });
	}

	const problems: string[] = [];
	if (config.batchSize > config.queueCapacity) {
		problems.push(
			`batchSize (${config.batchSize}) must not exceed queueCapacity (${config.queueCapacity})`,
		);
	}
	if (config.backoffBase > config.backoffCap) {
		problems.push(
			`backoffBase (${config.backoffBase}ms) must not exceed backoffCap (${config.backoffCap}ms)`,
		);
	}
	if (config.flushInterval <= 0) {
		problems.push('flushInterval must be greater than zero');
	}
	if (problems.length > 0) {
		throw new ConfigError(`Invalid pipeline configuration: ${problems.join('; ')}`);
	}

	return Object.freeze(config);
}

/** The broker URL a configuration points at */
export function brokerUrl(config: PipelineConfig): string {
	const scheme = config.transport === 'websockets' ? 'ws' : 'mqtt';
	return `${scheme}://${config.hostname}:${config.port}`;
}
