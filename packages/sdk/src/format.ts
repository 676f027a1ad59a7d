/**
 * Plain-text rendering of records, shared by the local sinks.
 *
 *   2025-01-15T10:30:00.000Z - INFO - app.db - connected host=db-1
 */

import type { LogRecord } from './types.js';

function formatValue(value: string): string {
	return value === '' || /[\s"=]/.test(value) ? JSON.stringify(value) : value;
}

/** ` key=value` pairs, keys sorted; values with spaces, quotes or `=` are quoted */
export function formatAttributes(attributes: Readonly<Record<string, string>> | undefined): string {
	if (!attributes) return '';
	return Object.keys(attributes)
		.sort()
		.map((key) => ` ${key}=${formatValue(attributes[key])}`)
		.join('');
}

/** One line per record: `<timestamp> - <LEVEL> - <logger> - <message>[ key=value...]` */
export function formatLine(record: LogRecord): string {
	return `${record.timestamp} - ${record.level} - ${record.loggerName} - ${record.message}${formatAttributes(record.attributes)}`;
}
