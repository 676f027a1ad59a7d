/**
 * Console sink — writes one line per record to stdout or stderr.
 */

import type { LogLevel, LogRecord, Sink } from '@logwire/sdk';
import { LEVEL_VALUES, parseLevel } from '@logwire/sdk';
import { formatRecord } from './format.js';

export class ConsoleSink implements Sink {
	readonly id = 'console';
	private stream: NodeJS.WriteStream = process.stderr;
	private useColor = false;
	private minLevel: LogLevel = 'DEBUG';

	async init(config: Record<string, unknown>): Promise<void> {
		this.stream = config.stream === 'stdout' ? process.stdout : process.stderr;
		this.useColor =
			typeof config.color === 'boolean' ? config.color : this.stream.isTTY === true && !process.env.NO_COLOR;
		if (typeof config.level === 'string') {
			this.minLevel = parseLevel(config.level);
		}
	}

	async log(record: LogRecord): Promise<void> {
		if (LEVEL_VALUES[record.level] < LEVEL_VALUES[this.minLevel]) return;
		this.stream.write(`${formatRecord(record, this.useColor)}\n`);
	}

	async flush(): Promise<void> {
		// Console output is unbuffered
	}

	async shutdown(): Promise<void> {
		// Nothing to clean up
	}
}
