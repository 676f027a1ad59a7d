/**
 * YAML config loading + JSON Schema validation.
 *
 * Loads logwire.yaml, resolves ${} env vars, validates against schema, maps
 * the snake_case pipeline keys onto PipelineConfigInput, applies the broker
 * environment overrides and returns a fully resolved LogwireConfig.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import AjvModule from 'ajv';
import yaml from 'js-yaml';

const Ajv = AjvModule.default ?? AjvModule;

import type { LogLevel, PipelineConfig, Sink, SinkRegistration } from '@logwire/sdk';
import { isLevelName, parseLevel } from '@logwire/sdk';
import { formatSchemaErrors, pipelineConfigSchema, resolvePipelineConfig } from './config.js';
import { ConfigError, SchemaError, errorMessage } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'logwire.yaml';

/** Environment variables that override the broker address from the file */
export const BROKER_HOST_ENV = 'LOGWIRE_BROKER_HOST';
export const BROKER_PORT_ENV = 'LOGWIRE_BROKER_PORT';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface SinkDefinition {
	/** Sink type, e.g. "console" or "file" */
	type: string;
	config: Record<string, unknown>;
}

export interface LogwireConfig {
	level: LogLevel;
	pipeline: PipelineConfig;
	sinks: SinkDefinition[];
}

interface RawConfig {
	level?: string;
	pipeline?: Record<string, unknown>;
	sinks?: { type: string; config?: Record<string, unknown> }[];
}

// ─── Key mapping ──────────────────────────────────────────────────────────────

type PipelineKey = keyof typeof pipelineConfigSchema.properties;

/** File key → PipelineConfigInput key */
const PIPELINE_KEYS: Record<string, PipelineKey> = {
	hostname: 'hostname',
	port: 'port',
	topic: 'topic',
	qos: 'qos',
	retain: 'retain',
	queue_capacity: 'queueCapacity',
	batch_size: 'batchSize',
	max_retries: 'maxRetries',
	backoff_base: 'backoffBase',
	backoff_cap: 'backoffCap',
	overflow: 'overflow',
	flush_interval: 'flushInterval',
	shutdown_timeout: 'shutdownTimeout',
	connect_timeout: 'connectTimeout',
	keepalive: 'keepalive',
	client_id: 'clientId',
	protocol_version: 'protocolVersion',
	transport: 'transport',
	will: 'will',
};

function pipelineFileSchema(): Record<string, unknown> {
	const properties: Record<string, unknown> = {};
	for (const [fileKey, key] of Object.entries(PIPELINE_KEYS)) {
		properties[fileKey] = pipelineConfigSchema.properties[key];
	}
	return { type: 'object', properties, additionalProperties: false };
}

// ─── JSON Schema for the config file ─────────────────────────────────────────

const configFileSchema = {
	type: 'object',
	properties: {
		level: { type: 'string' },
		pipeline: pipelineFileSchema(),
		sinks: {
			type: 'array',
			items: {
				type: 'object',
				required: ['type'],
				properties: {
					type: { type: 'string', minLength: 1 },
					config: { type: 'object' },
				},
				additionalProperties: false,
			},
		},
	},
	additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
// Sink schemas use `format: 'log-level'` for level names
ajv.addFormat('log-level', isLevelName);
const validateFile = ajv.compile<RawConfig>(configFileSchema);

// ─── Env var substitution ─────────────────────────────────────────────────────

function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			const envVal = env[varName];
			if (envVal === undefined) {
				throw new ConfigError(`Environment variable "${varName}" is not set`);
			}
			return envVal;
		});
	}
	if (Array.isArray(value)) {
		return value.map((item) => substituteEnvVars(item, env));
	}
	if (value !== null && typeof value === 'object') {
		const result: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			result[k] = substituteEnvVars(v, env);
		}
		return result;
	}
	return value;
}

// ─── Public API ───────────────────────────────────────────────────────────────

export interface ParseConfigOptions {
	/** Environment for ${} substitution and broker overrides (default: process.env) */
	env?: NodeJS.ProcessEnv;
	/** Shown in error messages */
	source?: string;
}

export interface LoadConfigOptions extends ParseConfigOptions {
	/** Path to logwire.yaml */
	configPath: string;
}

function applyBrokerOverrides(pipeline: Record<string, unknown>, env: NodeJS.ProcessEnv): void {
	const host = env[BROKER_HOST_ENV];
	if (host) {
		pipeline.hostname = host;
	}
	const port = env[BROKER_PORT_ENV];
	if (port) {
		if (!/^\d+$/.test(port)) {
			throw new ConfigError(`${BROKER_PORT_ENV} must be a port number, got "${port}"`);
		}
		pipeline.port = Number.parseInt(port, 10);
	}
}

/**
 * Parse and validate configuration text. Empty text yields the defaults.
 */
export function parseConfig(text: string, options: ParseConfigOptions = {}): LogwireConfig {
	const env = options.env ?? process.env;
	const source = options.source ?? DEFAULT_CONFIG_FILE;

	let parsed: unknown;
	try {
		parsed = yaml.load(text);
	} catch (err) {
		throw new ConfigError(`Failed to parse ${source}: ${errorMessage(err)}`, { cause: err });
	}
	const raw = substituteEnvVars(parsed ?? {}, env);

	if (!validateFile(raw)) {
		throw new SchemaError(`Invalid configuration in ${source}`, formatSchemaErrors(validateFile.errors));
	}

	const pipelineInput: Record<string, unknown> = {};
	for (const [fileKey, value] of Object.entries(raw.pipeline ?? {})) {
		const key = PIPELINE_KEYS[fileKey];
		if (key) pipelineInput[key] = value;
	}
	applyBrokerOverrides(pipelineInput, env);

	let level: LogLevel;
	try {
		level = parseLevel(raw.level ?? 'DEBUG');
	} catch (err) {
		throw new ConfigError(errorMessage(err), { cause: err });
	}

	return {
		level,
		pipeline: resolvePipelineConfig(pipelineInput),
		sinks: (raw.sinks ?? []).map((s) => ({ type: s.type, config: s.config ?? {} })),
	};
}

/**
 * Load and validate a logwire configuration from YAML.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<LogwireConfig> {
	const path = resolve(options.configPath);
	let content: string;
	try {
		content = await readFile(path, 'utf-8');
	} catch (err) {
		throw new ConfigError(`Failed to load YAML file: ${path}`, { cause: err });
	}
	return parseConfig(content, { env: options.env, source: options.source ?? path });
}

/**
 * Check a sink's config against its registration schema.
 * Throws SchemaError listing the violations.
 */
export function validateSinkConfig(registration: SinkRegistration, config: Record<string, unknown>): void {
	if (!registration.configSchema) return;
	const validate = ajv.compile(registration.configSchema);
	if (!validate(config)) {
		throw new SchemaError(`Invalid config for sink "${registration.id}"`, formatSchemaErrors(validate.errors));
	}
}

/**
 * Validate a sink's config, then construct and initialize it.
 */
export async function createSink(
	registration: SinkRegistration,
	config: Record<string, unknown>,
): Promise<Sink> {
	validateSinkConfig(registration, config);
	const sink = new registration.sink();
	await sink.init(config);
	return sink;
}
