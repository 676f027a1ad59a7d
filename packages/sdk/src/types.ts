/**
 * Core type definitions for logwire.
 *
 * Every package (core pipeline, sinks, CLI) depends on these shapes.
 */

// ─── Levels ───────────────────────────────────────────────────────────────────

/** Level names, lowest to highest severity */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Numeric severity per level. Higher is more severe. */
export const LEVEL_VALUES: Record<LogLevel, number> = {
	DEBUG: 10,
	INFO: 20,
	WARNING: 30,
	ERROR: 40,
	CRITICAL: 50,
};

/** Level aliases accepted by parseLevel() */
const LEVEL_ALIASES: Record<string, LogLevel> = {
	WARN: 'WARNING',
	FATAL: 'CRITICAL',
};

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/** True for every name parseLevel() accepts */
export function isLevelName(name: string): boolean {
	const upper = name.trim().toUpperCase();
	return isLogLevel(upper) || upper in LEVEL_ALIASES;
}

/**
 * Parse a level name, case-insensitive. Accepts WARN and FATAL as aliases.
 * Throws on unknown names.
 */
export function parseLevel(name: string): LogLevel {
	const upper = name.trim().toUpperCase();
	if (isLogLevel(upper)) return upper;
	const alias = LEVEL_ALIASES[upper];
	if (alias) return alias;
	throw new Error(`Unknown log level: "${name}". Expected one of ${LOG_LEVELS.join(', ')}`);
}

/** Compare two levels: negative when a < b, zero when equal, positive when a > b */
export function compareLevels(a: LogLevel, b: LogLevel): number {
	return LEVEL_VALUES[a] - LEVEL_VALUES[b];
}

// ─── Records ──────────────────────────────────────────────────────────────────

/** A single structured log record. Frozen once created. */
export interface LogRecord {
	/** ISO 8601 timestamp (UTC) */
	readonly timestamp: string;
	readonly level: LogLevel;
	/** Name of the logger that produced the record (e.g. "app.db") */
	readonly loggerName: string;
	readonly message: string;
	/** Flat string attributes */
	readonly attributes?: Readonly<Record<string, string>>;
}

// ─── Wire ─────────────────────────────────────────────────────────────────────

/** MQTT quality-of-service level */
export type QoS = 0 | 1 | 2;

/** A record ready for the broker */
export interface EncodedMessage {
	readonly topic: string;
	readonly payload: Buffer;
	readonly qos: QoS;
	readonly retain: boolean;
}

// ─── Pipeline configuration ───────────────────────────────────────────────────

/** What the bounded queue does when it is full */
export type OverflowPolicy = 'drop_oldest' | 'drop_newest';

/** Network transport used to reach the broker */
export type BrokerTransportKind = 'tcp' | 'websockets';

/** MQTT protocol version: 3 = 3.1, 4 = 3.1.1, 5 = 5.0 */
export type ProtocolVersion = 3 | 4 | 5;

/** Last-will message the broker publishes if the client vanishes */
export interface WillMessage {
	topic: string;
	payload: string;
	qos: QoS;
	retain: boolean;
}

/** Fully resolved, immutable pipeline configuration. Durations are milliseconds. */
export interface PipelineConfig {
	readonly hostname: string;
	readonly port: number;
	/** Topic template; supports {loggerName}, {loggerPath} and {level} */
	readonly topic: string;
	readonly qos: QoS;
	readonly retain: boolean;
	readonly queueCapacity: number;
	readonly batchSize: number;
	readonly maxRetries: number;
	readonly backoffBase: number;
	readonly backoffCap: number;
	readonly overflow: OverflowPolicy;
	/** Delivery worker wake-up interval */
	readonly flushInterval: number;
	/** Upper bound for the final drain on shutdown */
	readonly shutdownTimeout: number;
	readonly connectTimeout: number;
	/** Keep-alive interval in seconds (MQTT convention) */
	readonly keepalive: number;
	/** Empty string lets the client library generate one */
	readonly clientId: string;
	readonly protocolVersion: ProtocolVersion;
	readonly transport: BrokerTransportKind;
	readonly will?: Readonly<WillMessage>;
}

/**
 * Caller-supplied pipeline configuration. Every field is optional; durations
 * may be milliseconds or duration strings ("500ms", "30s").
 */
export interface PipelineConfigInput {
	hostname?: string;
	port?: number;
	topic?: string;
	qos?: number;
	retain?: boolean;
	queueCapacity?: number;
	batchSize?: number;
	maxRetries?: number;
	backoffBase?: number | DurationString;
	backoffCap?: number | DurationString;
	overflow?: OverflowPolicy;
	flushInterval?: number | DurationString;
	shutdownTimeout?: number | DurationString;
	connectTimeout?: number | DurationString;
	keepalive?: number | DurationString;
	clientId?: string;
	protocolVersion?: number;
	transport?: BrokerTransportKind;
	will?: WillMessage;
}

// ─── Connection state ─────────────────────────────────────────────────────────

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'closed';

// ─── Pipeline statistics ──────────────────────────────────────────────────────

export interface PipelineStats {
	/** Records accepted into the queue */
	accepted: number;
	/** Messages acknowledged by the transport */
	published: number;
	/** Messages lost to queue overflow (evicted or rejected) */
	droppedOverflow: number;
	/** Records that could not be encoded */
	droppedEncoding: number;
	/** Messages dropped after exhausting delivery retries */
	droppedDelivery: number;
	/** Failed connection attempts */
	connectFailures: number;
	/** Successful connections after the first */
	reconnects: number;
	/** Messages currently waiting in the queue */
	queueDepth: number;
	connection: ConnectionState;
}

// ─── Utilities ────────────────────────────────────────────────────────────────

/** Duration string (e.g., "500ms", "30s", "5m", "1h") */
export type DurationString = string;

/** Parse a duration string to milliseconds */
export function parseDuration(duration: DurationString): number {
	const match = duration.match(/^(\d+)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(
			`Invalid duration format: "${duration}". Expected format: <number><unit> (e.g., 500ms, 30s, 5m)`,
		);
	}
	const value = Number.parseInt(match[1], 10);
	const unit = match[2];
	switch (unit) {
		case 'ms':
			return value;
		case 's':
			return value * 1000;
		case 'm':
			return value * 60 * 1000;
		case 'h':
			return value * 60 * 60 * 1000;
		case 'd':
			return value * 24 * 60 * 60 * 1000;
		default:
			throw new Error(`Unknown duration unit: ${unit}`);
	}
}
