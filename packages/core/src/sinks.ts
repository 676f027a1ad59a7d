/**
 * Sink fan-out manager.
 *
 * Fans out each LogRecord to every attached sink, in parallel with the
 * broker pipeline. A failing sink is reported on the diagnostic channel and
 * never affects the others or the pipeline.
 */

import type { LogRecord, Sink } from '@logwire/sdk';
import { errorMessage } from './errors.js';

export class SinkManager {
	private readonly sinks: Sink[] = [];
	private readonly onDiagnostic: (message: string) => void;

	constructor(onDiagnostic: (message: string) => void = () => {}) {
		this.onDiagnostic = onDiagnostic;
	}

	addSink(sink: Sink): void {
		this.sinks.push(sink);
	}

	get size(): number {
		return this.sinks.length;
	}

	/**
	 * Fan out a record to all sinks.
	 * Fires all sinks concurrently and reports individual failures.
	 */
	async log(record: LogRecord): Promise<void> {
		await this.each('log', (sink) => sink.log(record));
	}

	/** Flush all sinks */
	async flush(): Promise<void> {
		await this.each('flush', (sink) => sink.flush());
	}

	/** Shutdown all sinks */
	async shutdown(): Promise<void> {
		await this.each('shutdown', (sink) => sink.shutdown());
	}

	private async each(action: string, fn: (sink: Sink) => Promise<void>): Promise<void> {
		await Promise.allSettled(
			this.sinks.map(async (sink) => {
				try {
					await fn(sink);
				} catch (err) {
					this.onDiagnostic(`Sink "${sink.id}" ${action} failed: ${errorMessage(err)}`);
				}
			}),
		);
	}
}
