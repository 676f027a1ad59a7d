/**
 * Delivery worker — the single background task of a pipeline.
 *
 * Wakes when a record is pushed, when the flush interval fires, or when the
 * connection comes up. A cycle drains up to batchSize messages at a time and
 * publishes them; cycles never overlap, so the broker sees messages in push
 * order. A failed batch is retried up to maxRetries times with exponential
 * backoff, then dropped and counted.
 */

import type { ConnectionState, EncodedMessage, PipelineConfig } from '@logwire/sdk';
import { computeBackoff, delay } from './backoff.js';
import type { ConnectionManager } from './connection.js';
import { DeliveryExhausted, errorMessage, NotConnectedError } from './errors.js';
import type { BoundedQueue } from './queue.js';

/** Why the worker gave up on messages */
export type DeliveryDropReason = 'retries_exhausted' | 'shutdown';

export interface DeliveryWorkerOptions {
	name: string;
	config: PipelineConfig;
	queue: BoundedQueue<EncodedMessage>;
	connection: ConnectionManager;
	/** Called after each acknowledged batch */
	onPublished?: (count: number) => void;
	/** Called when messages are dropped after retries or at shutdown */
	onDropped?: (count: number, reason: DeliveryDropReason) => void;
	onDiagnostic?: (message: string) => void;
}

export class DeliveryWorker {
	private running = false;
	private cycle: Promise<void> | null = null;
	private wakePending = false;
	private flushTimer: ReturnType<typeof setInterval> | null = null;
	private halt = new AbortController();
	/** Unacknowledged part of the current batch; acked messages leave it one by one */
	private carry: EncodedMessage[] = [];
	/** Bumped once stop() has accounted for what is left; late acks from older epochs are ignored */
	private epoch = 0;
	private publishedCount = 0;
	private droppedCount = 0;

	private readonly name: string;
	private readonly config: PipelineConfig;
	private readonly queue: BoundedQueue<EncodedMessage>;
	private readonly connection: ConnectionManager;
	private readonly options: DeliveryWorkerOptions;

	constructor(options: DeliveryWorkerOptions) {
		this.name = options.name;
		this.config = options.config;
		this.queue = options.queue;
		this.connection = options.connection;
		this.options = options;
	}

	get isRunning(): boolean {
		return this.running;
	}

	get published(): number {
		return this.publishedCount;
	}

	get droppedDelivery(): number {
		return this.droppedCount;
	}

	/** Messages held by an in-flight or interrupted batch */
	get inFlight(): number {
		return this.carry.length;
	}

	start(): void {
		if (this.running) return;
		this.running = true;
		this.halt = new AbortController();
		this.connection.on('state', this.onState);
		this.flushTimer = setInterval(() => this.notify(), this.config.flushInterval);
		if (this.flushTimer.unref) {
			this.flushTimer.unref();
		}
		this.notify();
	}

	/** Request a drain cycle. Coalesces with one already running. */
	notify(): void {
		if (!this.running) return;
		if (this.cycle) {
			this.wakePending = true;
			return;
		}
		if (!this.connection.isConnected || this.queue.isEmpty) return;

		this.cycle = this.runCycle()
			.catch((err) => this.diagnostic(`[${this.name}] Delivery cycle failed: ${errorMessage(err)}`))
			.finally(() => {
				this.cycle = null;
				if (this.wakePending) {
					this.wakePending = false;
					this.notify();
				}
			});
	}

	/**
	 * Stop accepting cycles, then make one final attempt to deliver what is
	 * left, bounded by `timeoutMs`. Whatever is still undelivered afterwards
	 * is dropped and counted. Returns the number of messages dropped.
	 */
	async stop(timeoutMs: number): Promise<number> {
		if (!this.running) return this.discardLeftovers();
		this.running = false;
		this.wakePending = false;
		this.connection.off('state', this.onState);
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}
		this.halt.abort();

		const deadline = new AbortController();
		const timer = setTimeout(() => deadline.abort(), timeoutMs);
		try {
			await Promise.race([this.finalDrain(deadline.signal), delay(timeoutMs, deadline.signal)]);
		} finally {
			clearTimeout(timer);
			deadline.abort();
		}

		return this.discardLeftovers();
	}

	/** Count everything still held as dropped at shutdown and close the epoch */
	private discardLeftovers(): number {
		this.epoch++;
		const leftover = this.carry.length + this.queue.size;
		this.carry = [];
		this.queue.clear();
		if (leftover > 0) {
			this.drop(leftover, 'shutdown', `[${this.name}] Dropped ${leftover} undelivered message(s) at shutdown`);
		}
		return leftover;
	}

	private readonly onState = (state: ConnectionState): void => {
		if (state === 'connected') this.notify();
	};

	private async runCycle(): Promise<void> {
		while (this.running && this.connection.isConnected && !this.queue.isEmpty) {
			await this.deliver(this.queue.drain(this.config.batchSize));
		}
	}

	/**
	 * Publish one batch: the initial attempt plus up to maxRetries retries.
	 * A retry resends only the messages not yet acknowledged, and a retry
	 * while the connection is down fails without touching the transport.
	 */
	private async deliver(batch: EncodedMessage[]): Promise<void> {
		const epoch = this.epoch;
		const attempts = this.config.maxRetries + 1;
		let lastError: unknown = null;

		this.carry = batch;
		for (let attempt = 0; attempt < attempts; attempt++) {
			if (attempt > 0) {
				const wait = computeBackoff(attempt, this.config.backoffBase, this.config.backoffCap);
				const elapsed = await delay(wait, this.halt.signal);
				if (!elapsed) return; // stopped: the remainder stays in carry for the final drain
			}

			const pending = this.carry.length;
			try {
				if (!this.connection.isConnected) {
					throw new NotConnectedError(this.connection.state);
				}
				await this.publishCarry(epoch);
				return;
			} catch (err) {
				if (this.epoch !== epoch) return;
				lastError = err;
				this.diagnostic(
					`[${this.name}] Publish of ${pending} message(s) failed (attempt ${attempt + 1}/${attempts}): ${errorMessage(err)}`,
				);
				if (this.halt.signal.aborted) return;
			}
		}

		if (this.epoch !== epoch) return;
		const remaining = this.carry.length;
		this.carry = [];
		const exhausted = new DeliveryExhausted(this.name, remaining, attempts, { cause: lastError });
		this.drop(remaining, 'retries_exhausted', exhausted.message);
	}

	/**
	 * Publish what is left in carry. Each acknowledged message is removed from
	 * carry as it lands, so a failure leaves exactly the unsent remainder.
	 * Acks arriving after the epoch closed were already counted as dropped.
	 */
	private async publishCarry(epoch: number): Promise<void> {
		let acked = 0;
		try {
			await this.connection.publish(this.carry, () => {
				if (this.epoch !== epoch) return;
				this.carry = this.carry.slice(1);
				acked++;
			});
		} finally {
			if (acked > 0) this.acknowledge(acked);
		}
	}

	/** Deliver the interrupted remainder and the queue, waiting for a connection if needed. */
	private async finalDrain(signal: AbortSignal): Promise<void> {
		if (this.cycle) {
			await this.cycle;
		}

		const epoch = this.epoch;
		while (!signal.aborted && (this.carry.length > 0 || !this.queue.isEmpty)) {
			if (!this.connection.isConnected) {
				const up = await this.waitForConnection(signal);
				if (!up) return;
			}

			if (this.carry.length === 0) {
				this.carry = this.queue.drain(this.config.batchSize);
			}
			try {
				await this.publishCarry(epoch);
			} catch (err) {
				this.diagnostic(`[${this.name}] Final publish failed: ${errorMessage(err)}`);
				if (!(await delay(this.config.backoffBase, signal))) return;
			}
		}
	}

	private waitForConnection(signal: AbortSignal): Promise<boolean> {
		if (this.connection.isConnected) return Promise.resolve(true);
		if (signal.aborted || this.connection.state === 'closed') return Promise.resolve(false);

		return new Promise<boolean>((resolve) => {
			const finish = (up: boolean) => {
				this.connection.off('state', onState);
				signal.removeEventListener('abort', onAbort);
				resolve(up);
			};
			const onState = (state: ConnectionState) => {
				if (state === 'connected') finish(true);
				else if (state === 'closed') finish(false);
			};
			const onAbort = () => finish(false);
			this.connection.on('state', onState);
			signal.addEventListener('abort', onAbort, { once: true });
		});
	}

	private acknowledge(count: number): void {
		this.publishedCount += count;
		this.options.onPublished?.(count);
	}

	private drop(count: number, reason: DeliveryDropReason, note: string): void {
		this.droppedCount += count;
		this.diagnostic(note);
		this.options.onDropped?.(count, reason);
	}

	private diagnostic(message: string): void {
		this.options.onDiagnostic?.(message);
	}
}
