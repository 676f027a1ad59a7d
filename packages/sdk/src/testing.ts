/**
 * Test harness for logwire packages and sink authors.
 *
 * Provides an in-process stand-in for the broker and a recording sink, so
 * pipelines and sinks can be tested without a network.
 */

import { createRecord, type CreateRecordOptions } from './record.js';
import type { Sink } from './sink.js';
import type { BrokerTransport, PublishOptions } from './transport.js';
import type { LogRecord, PipelineConfig, QoS } from './types.js';

// ─── Mock Broker ──────────────────────────────────────────────────────────────

export interface PublishedMessage {
	topic: string;
	payload: Buffer;
	qos: QoS;
	retain: boolean;
	/** Index of the transport (connection) that carried the message */
	session: number;
}

/**
 * In-process broker stand-in. Hand `broker.createTransport` to a pipeline
 * in place of the real MQTT transport; every connection attempt gets its own
 * MockTransport, and everything published lands in `broker.published`.
 */
export class MockBroker {
	readonly transports: MockTransport[] = [];
	readonly published: PublishedMessage[] = [];
	readonly configs: PipelineConfig[] = [];

	private refusalsLeft = 0;
	private publishFailuresLeft = 0;
	private publishSuccessesBeforeFailure = 0;
	/** When true, publish() never settles */
	stallPublishes = false;
	/** When true, publish() settles only when the transport is ended, as in-flight acks do on close */
	holdPublishes = false;

	/** Reject the next `count` connection attempts */
	refuseConnections(count: number): void {
		this.refusalsLeft = count;
	}

	/** Reject `count` publish calls (Infinity for all of them) once `after` more have succeeded */
	failPublishes(count: number, after = 0): void {
		this.publishFailuresLeft = count;
		this.publishSuccessesBeforeFailure = after;
	}

	readonly createTransport = (config: PipelineConfig): MockTransport => {
		this.configs.push(config);
		const transport = new MockTransport(this, this.transports.length);
		this.transports.push(transport);
		return transport;
	};

	/** Drop the live connection, as if the keep-alive timed out */
	disconnect(reason = new Error('keep-alive timeout')): void {
		for (const transport of this.transports) {
			if (transport.connected) transport.simulateDisconnect(reason);
		}
	}

	/** Payloads received so far, decoded as UTF-8 */
	payloads(): string[] {
		return this.published.map((m) => m.payload.toString('utf-8'));
	}

	get connectAttempts(): number {
		return this.transports.length;
	}

	/** @internal */
	takeRefusal(): boolean {
		if (this.refusalsLeft <= 0) return false;
		this.refusalsLeft--;
		return true;
	}

	/** @internal */
	takePublishFailure(): boolean {
		if (this.publishFailuresLeft <= 0) return false;
		if (this.publishSuccessesBeforeFailure > 0) {
			this.publishSuccessesBeforeFailure--;
			return false;
		}
		this.publishFailuresLeft--;
		return true;
	}
}

export class MockTransport implements BrokerTransport {
	connected = false;
	ended = false;
	publishCalls = 0;
	private held: Array<() => void> = [];
	private disconnectHandler: ((reason: Error) => void) | null = null;

	constructor(
		private readonly broker: MockBroker,
		readonly session: number,
	) {}

	async connect(): Promise<void> {
		if (this.broker.takeRefusal()) {
			throw new Error('connect ECONNREFUSED');
		}
		this.connected = true;
	}

	async publish(topic: string, payload: Buffer, options: PublishOptions): Promise<void> {
		this.publishCalls++;
		if (!this.connected) {
			throw new Error('transport is not connected');
		}
		if (this.broker.stallPublishes) {
			return new Promise<void>(() => {});
		}
		if (this.broker.takePublishFailure()) {
			throw new Error('publish rejected');
		}
		const record = (): void => {
			this.broker.published.push({ topic, payload, ...options, session: this.session });
		};
		if (this.broker.holdPublishes) {
			return new Promise<void>((resolve) => {
				this.held.push(() => {
					record();
					resolve();
				});
			});
		}
		record();
	}

	async end(): Promise<void> {
		this.ended = true;
		this.connected = false;
		for (const release of this.held.splice(0)) release();
	}

	onDisconnect(handler: (reason: Error) => void): void {
		this.disconnectHandler = handler;
	}

	simulateDisconnect(reason: Error): void {
		if (!this.connected) return;
		this.connected = false;
		this.disconnectHandler?.(reason);
	}
}

// ─── Mock Sink ────────────────────────────────────────────────────────────────

/**
 * Sink that records everything it receives.
 */
export class MockSink implements Sink {
	readonly id: string;
	readonly records: LogRecord[] = [];
	config: Record<string, unknown> | null = null;
	flushed = false;
	shutdownCalled = false;
	/** When set, log() throws this error */
	failWith: Error | null = null;

	constructor(id = 'mock-sink') {
		this.id = id;
	}

	async init(config: Record<string, unknown>): Promise<void> {
		this.config = config;
	}

	async log(record: LogRecord): Promise<void> {
		if (this.failWith) throw this.failWith;
		this.records.push(record);
	}

	async flush(): Promise<void> {
		this.flushed = true;
	}

	async shutdown(): Promise<void> {
		this.flushed = true;
		this.shutdownCalled = true;
	}

	messages(): string[] {
		return this.records.map((r) => r.message);
	}
}

// ─── Test Record Factory ──────────────────────────────────────────────────────

/**
 * Create a record with fixed defaults for tests.
 */
export function createTestRecord(overrides: Partial<CreateRecordOptions> = {}): LogRecord {
	return createRecord({
		level: 'INFO',
		loggerName: 'test.logger',
		message: 'test message',
		timestamp: '2025-01-15T10:30:00.000Z',
		...overrides,
	});
}
