/**
 * Front end — the handle applications log through.
 *
 * A handle filters by level, builds the record, pushes it into the named
 * broker pipeline and hands the same record to any local sinks. Nothing that
 * happens to the record afterwards (queue overflow, broker down, retries
 * exhausted) surfaces here.
 */

import type { LogLevel, PipelineConfigInput, Sink } from '@logwire/sdk';
import { LEVEL_VALUES, createRecord, parseLevel } from '@logwire/sdk';
import { ConfigError, EncodingError, errorMessage } from './errors.js';
import type { Pipeline } from './pipeline.js';
import type { PipelineRegistry } from './registry.js';
import { writeDiagnostic } from './registry.js';
import { SinkManager } from './sinks.js';

export type Attributes = Record<string, string>;

export interface CreateLoggerOptions {
	/** Minimum level; records below it are skipped (default: DEBUG) */
	level?: LogLevel | string;
	/** Used only if this name has no pipeline yet */
	pipeline?: PipelineConfigInput;
	/** Initialized sinks that receive every record alongside the pipeline */
	sinks?: Sink[];
	/** Where swallowed errors go (default: stderr) */
	onDiagnostic?: (message: string) => void;
}

export class LogHandle {
	readonly name: string;
	readonly pipeline: Pipeline;
	private minLevel: LogLevel;
	private readonly sinks: SinkManager;
	private readonly onDiagnostic: (message: string) => void;
	/** Sink writes are chained so each sink sees records in call order */
	private sinkChain: Promise<void> = Promise.resolve();

	constructor(
		name: string,
		pipeline: Pipeline,
		sinks: SinkManager,
		level: LogLevel,
		onDiagnostic: (message: string) => void,
	) {
		this.name = name;
		this.pipeline = pipeline;
		this.sinks = sinks;
		this.minLevel = level;
		this.onDiagnostic = onDiagnostic;
	}

	get level(): LogLevel {
		return this.minLevel;
	}

	setLevel(level: LogLevel | string): void {
		this.minLevel = resolveLevel(level);
	}

	isEnabledFor(level: LogLevel): boolean {
		return LEVEL_VALUES[level] >= LEVEL_VALUES[this.minLevel];
	}

	/**
	 * Log a message. Returns true when the broker pipeline accepted the
	 * record; false when it was filtered, refused by a full queue, or could
	 * not be encoded.
	 */
	log(level: LogLevel, message: string, attributes?: Attributes): boolean {
		if (!this.isEnabledFor(level)) return false;

		const record = createRecord({ level, loggerName: this.name, message, attributes });

		if (this.sinks.size > 0) {
			this.sinkChain = this.sinkChain.then(() => this.sinks.log(record));
		}

		try {
			return this.pipeline.push(record);
		} catch (err) {
			if (err instanceof EncodingError) {
				this.onDiagnostic(`Dropped record: ${err.message}`);
				return false;
			}
			throw err;
		}
	}

	debug(message: string, attributes?: Attributes): boolean {
		return this.log('DEBUG', message, attributes);
	}

	info(message: string, attributes?: Attributes): boolean {
		return this.log('INFO', message, attributes);
	}

	warning(message: string, attributes?: Attributes): boolean {
		return this.log('WARNING', message, attributes);
	}

	error(message: string, attributes?: Attributes): boolean {
		return this.log('ERROR', message, attributes);
	}

	critical(message: string, attributes?: Attributes): boolean {
		return this.log('CRITICAL', message, attributes);
	}

	/** Wait for pending sink writes, then flush the sinks. */
	async flush(): Promise<void> {
		await this.sinkChain;
		await this.sinks.flush();
	}

	/**
	 * Flush and shut down this handle's sinks. The pipeline belongs to the
	 * registry and is shut down there.
	 */
	async shutdown(): Promise<void> {
		await this.sinkChain;
		await this.sinks.shutdown();
	}
}

/** parseLevel, reported as a ConfigError */
export function resolveLevel(level: LogLevel | string): LogLevel {
	try {
		return parseLevel(level);
	} catch (err) {
		throw new ConfigError(errorMessage(err), { cause: err });
	}
}

/**
 * Get or create the pipeline for `name` and wrap it in a handle.
 *
 * Handles are cheap; several handles may share one pipeline, each with its
 * own level and sinks.
 */
export function createLogger(
	registry: PipelineRegistry,
	name: string,
	options: CreateLoggerOptions = {},
): LogHandle {
	const onDiagnostic = options.onDiagnostic ?? writeDiagnostic;
	const level = resolveLevel(options.level ?? 'DEBUG');
	const pipeline = registry.getOrCreate(name, options.pipeline);

	const sinks = new SinkManager(onDiagnostic);
	for (const sink of options.sinks ?? []) {
		sinks.addSink(sink);
	}

	return new LogHandle(name, pipeline, sinks, level, onDiagnostic);
}
