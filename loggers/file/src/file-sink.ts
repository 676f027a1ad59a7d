/**
 * File sink — appends one line per record to a local file, buffered.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, resolve } from 'node:path';
import type { LogRecord, Sink } from '@logwire/sdk';
import { formatLine, parseDuration } from '@logwire/sdk';

export type FileFormat = 'text' | 'jsonl';

function pad(value: number): string {
	return String(value).padStart(2, '0');
}

/** `logs/<YYYYMMDD-HHMMSS>-<name>.log`, stamped in local time */
export function defaultLogPath(name: string, now: Date = new Date()): string {
	const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
	const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
	return `logs/${date}-${time}-${name}.log`;
}

function readBuffer(value: unknown): { size?: number; flushInterval?: string } {
	if (typeof value !== 'object' || value === null) return {};
	const size = 'size' in value && typeof value.size === 'number' ? value.size : undefined;
	const flushInterval =
		'flush_interval' in value && typeof value.flush_interval === 'string' ? value.flush_interval : undefined;
	return { size, flushInterval };
}

export class FileSink implements Sink {
	readonly id = 'file';
	private filePath = '';
	private format: FileFormat = 'text';
	private buffer: string[] = [];
	private bufferSize = 100;
	private flushTimer: ReturnType<typeof setInterval> | null = null;
	private dirEnsured = false;
	private lost = 0;
	private lastWriteError: Error | null = null;

	async init(config: Record<string, unknown>): Promise<void> {
		const name = typeof config.name === 'string' ? config.name : 'logwire';
		const rawPath = typeof config.path === 'string' ? config.path : defaultLogPath(name);
		const expanded = rawPath.startsWith('~/') ? rawPath.replace('~', homedir()) : rawPath;
		this.filePath = resolve(expanded);

		if (config.format === 'jsonl') this.format = 'jsonl';

		const buffer = readBuffer(config.buffer);
		if (buffer.size !== undefined) this.bufferSize = Math.max(1, buffer.size);
		const intervalMs = parseDuration(buffer.flushInterval ?? '1s');
		this.flushTimer = setInterval(() => {
			void this.flush();
		}, intervalMs);
		this.flushTimer.unref();

		// Create the file up front so tail -f works immediately
		await this.ensureDir();
		await appendFile(this.filePath, '', 'utf-8');
	}

	/** Absolute path of the file being written */
	get path(): string {
		return this.filePath;
	}

	/** Lines lost to write failures */
	get droppedLines(): number {
		return this.lost;
	}

	get lastError(): Error | null {
		return this.lastWriteError;
	}

	async log(record: LogRecord): Promise<void> {
		this.buffer.push(this.format === 'jsonl' ? JSON.stringify(record) : formatLine(record));
		if (this.buffer.length >= this.bufferSize) {
			await this.flush();
		}
	}

	async flush(): Promise<void> {
		if (this.buffer.length === 0) return;

		const lines = this.buffer.splice(0);
		const data = lines.map((line) => `${line}\n`).join('');

		try {
			await this.ensureDir();
			await appendFile(this.filePath, data, 'utf-8');
		} catch (err) {
			this.lost += lines.length;
			this.lastWriteError = err instanceof Error ? err : new Error(String(err));
		}
	}

	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}
		await this.flush();
	}

	private async ensureDir(): Promise<void> {
		if (this.dirEnsured) return;
		await mkdir(dirname(this.filePath), { recursive: true });
		this.dirEnsured = true;
	}
}
