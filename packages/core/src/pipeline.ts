/**
 * Pipeline — one named log stream to the broker.
 *
 * Owns a bounded queue, a connection manager and a delivery worker. push()
 * encodes and enqueues without waiting on the network; everything after the
 * queue happens in the background.
 */

import type {
	ConnectionState,
	EncodedMessage,
	LogRecord,
	PipelineConfig,
	PipelineStats,
	TransportFactory,
} from '@logwire/sdk';
import { delay } from './backoff.js';
import { ConnectionManager } from './connection.js';
import { encode } from './encoder.js';
import type { PipelineMetrics } from './metrics.js';
import { BoundedQueue } from './queue.js';
import { DeliveryWorker } from './worker.js';

export interface PipelineOptions {
	name: string;
	config: PipelineConfig;
	createTransport: TransportFactory;
	metrics?: PipelineMetrics;
	onDiagnostic?: (message: string) => void;
}

export class Pipeline {
	readonly name: string;
	readonly config: PipelineConfig;
	readonly connection: ConnectionManager;

	private readonly queue: BoundedQueue<EncodedMessage>;
	private readonly worker: DeliveryWorker;
	private readonly metrics: PipelineMetrics | null;
	private acceptedCount = 0;
	private encodingFailures = 0;
	private started = false;
	private shutdownPromise: Promise<void> | null = null;

	constructor(options: PipelineOptions) {
		this.name = options.name;
		this.config = options.config;
		this.metrics = options.metrics ?? null;

		this.queue = new BoundedQueue<EncodedMessage>(this.config.queueCapacity, this.config.overflow);
		this.connection = new ConnectionManager({
			config: this.config,
			createTransport: options.createTransport,
			onDiagnostic: options.onDiagnostic,
		});
		this.worker = new DeliveryWorker({
			name: this.name,
			config: this.config,
			queue: this.queue,
			connection: this.connection,
			onDiagnostic: options.onDiagnostic,
			onPublished: (count) => {
				this.metrics?.recordPublished(this.name, count);
				this.metrics?.setQueueDepth(this.name, this.queue.size);
			},
			onDropped: (count, reason) => {
				this.metrics?.recordDropped(this.name, reason, count);
				this.metrics?.setQueueDepth(this.name, this.queue.size);
			},
		});

		if (this.metrics) {
			const metrics = this.metrics;
			metrics.setConnected(this.name, false);
			metrics.setQueueDepth(this.name, 0);
			this.connection.on('state', (state: ConnectionState) => {
				metrics.setConnected(this.name, state === 'connected');
			});
			this.connection.on('connect_failure', () => {
				metrics.recordConnectFailure(this.name);
			});
		}
	}

	/** Begin connecting and delivering. Idempotent. */
	start(): void {
		if (this.started) return;
		this.started = true;
		this.worker.start();
		this.connection.connect();
	}

	get isShutdown(): boolean {
		return this.shutdownPromise !== null;
	}

	/**
	 * Encode and enqueue a record. Never waits on the network.
	 *
	 * Returns false when the queue refused the record (drop_newest on a full
	 * queue) or the pipeline is shut down. Throws EncodingError when the
	 * record cannot be encoded; the record is counted and dropped.
	 */
	push(record: LogRecord): boolean {
		if (this.shutdownPromise) return false;

		let message: EncodedMessage;
		try {
			message = encode(record, this.config);
		} catch (err) {
			this.encodingFailures++;
			this.metrics?.recordDropped(this.name, 'encoding');
			throw err;
		}

		const evictedBefore = this.queue.evicted;
		const accepted = this.queue.push(message);
		if (accepted) {
			this.acceptedCount++;
		}
		if (!accepted || this.queue.evicted > evictedBefore) {
			this.metrics?.recordDropped(this.name, 'overflow');
		}
		this.metrics?.setQueueDepth(this.name, this.queue.size);

		this.worker.notify();
		return accepted;
	}

	stats(): PipelineStats {
		return {
			accepted: this.acceptedCount,
			published: this.worker.published,
			droppedOverflow: this.queue.evicted + this.queue.rejected,
			droppedEncoding: this.encodingFailures,
			droppedDelivery: this.worker.droppedDelivery,
			connectFailures: this.connection.connectFailures,
			reconnects: this.connection.reconnects,
			queueDepth: this.queue.size + this.worker.inFlight,
			connection: this.connection.state,
		};
	}

	/**
	 * Stop the worker, make one final drain bounded by shutdownTimeout, then
	 * close the connection whatever the outcome. Safe to call more than once.
	 */
	shutdown(): Promise<void> {
		if (!this.shutdownPromise) {
			this.shutdownPromise = this.performShutdown();
		}
		return this.shutdownPromise;
	}

	private async performShutdown(): Promise<void> {
		try {
			await this.worker.stop(this.config.shutdownTimeout);
		} finally {
			// Close is bounded by the same timeout
			const bound = new AbortController();
			await Promise.race([this.connection.close(), delay(this.config.shutdownTimeout, bound.signal)]);
			bound.abort();
			this.metrics?.setQueueDepth(this.name, 0);
		}
	}
}
