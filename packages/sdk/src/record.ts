/**
 * Record helpers — building immutable LogRecords.
 */

import type { LogLevel, LogRecord } from './types.js';
import { isLogLevel } from './types.js';

export interface CreateRecordOptions {
	level: LogLevel;
	loggerName: string;
	message: string;
	attributes?: Record<string, string>;
	/** Defaults to now */
	timestamp?: string | Date;
}

/**
 * Build a frozen LogRecord. The attributes object is copied and frozen too,
 * so later mutation of the caller's object does not leak into the record.
 */
export function createRecord(options: CreateRecordOptions): LogRecord {
	if (!isLogLevel(options.level)) {
		throw new TypeError(`Invalid log level: ${String(options.level)}`);
	}

	const timestamp =
		options.timestamp instanceof Date
			? options.timestamp.toISOString()
			: (options.timestamp ?? new Date().toISOString());

	const record: LogRecord = {
		timestamp,
		level: options.level,
		loggerName: options.loggerName,
		message: options.message,
		...(options.attributes ? { attributes: Object.freeze({ ...options.attributes }) } : {}),
	};

	return Object.freeze(record);
}

/** Type guard for LogRecord-shaped values */
export function isLogRecord(value: unknown): value is LogRecord {
	if (typeof value !== 'object' || value === null) return false;
	if (!('timestamp' in value && 'level' in value && 'loggerName' in value && 'message' in value)) {
		return false;
	}
	const attributes = 'attributes' in value ? value.attributes : undefined;
	return (
		typeof value.timestamp === 'string' &&
		isLogLevel(value.level) &&
		typeof value.loggerName === 'string' &&
		typeof value.message === 'string' &&
		(attributes === undefined || (typeof attributes === 'object' && attributes !== null))
	);
}
