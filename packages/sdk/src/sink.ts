/**
 * Sink interface — local destinations that receive the same records as the
 * broker pipeline (console, file, ...).
 */

import type { LogRecord } from './types.js';

/**
 * Sink interface.
 *
 * Implement this to add a new local log destination. Sinks are called for
 * every record, so they should be fast.
 */
export interface Sink {
	/** Unique sink ID */
	readonly id: string;

	/** Initialize with config */
	init(config: Record<string, unknown>): Promise<void>;

	/**
	 * Called for every record.
	 * Should not throw — write errors are handled internally.
	 */
	log(record: LogRecord): Promise<void>;

	/** Flush any buffered records */
	flush(): Promise<void>;

	/** Clean shutdown (flush + close) */
	shutdown(): Promise<void>;
}

/**
 * Sink registration — what a sink package exports.
 */
export interface SinkRegistration {
	id: string;
	sink: new () => Sink;
	/** JSON Schema for config validation */
	configSchema?: Record<string, unknown>;
}
