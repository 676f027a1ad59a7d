/**
 * Formatting and color logic for the console sink.
 *
 * Uses ANSI escape codes directly — no external dependencies.
 */

import type { LogLevel, LogRecord } from '@logwire/sdk';
import { formatAttributes, formatLine } from '@logwire/sdk';

// ANSI color codes
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

const LEVEL_COLORS: Record<LogLevel, string> = {
	DEBUG: DIM,
	INFO: CYAN,
	WARNING: YELLOW,
	ERROR: RED,
	CRITICAL: `${BOLD}${RED}`,
};

/**
 * Format a record as `<timestamp> - <LEVEL> - <logger> - <message>`, with
 * attributes appended as key=value pairs.
 */
export function formatRecord(record: LogRecord, useColor: boolean): string {
	if (!useColor) return formatLine(record);

	const attributes = formatAttributes(record.attributes);
	const color = LEVEL_COLORS[record.level];
	const parts = [
		`${DIM}${record.timestamp}${RESET}`,
		`${color}${record.level}${RESET}`,
		record.loggerName,
		`${record.message}${attributes ? `${DIM}${attributes}${RESET}` : ''}`,
	];
	return parts.join(' - ');
}
