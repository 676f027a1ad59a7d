/**
 * Connection manager — owns the broker connection lifecycle.
 *
 * State machine: disconnected → connecting → connected → disconnected → …,
 * with `closed` as the only terminal state (explicit shutdown). Transitions
 * are driven by transport events and timers; a failed attempt schedules the
 * next one after min(backoffBase * 2^failures, backoffCap).
 *
 * Emits:
 *   'state'           (state, previous)
 *   'connect_failure' (ConnectFailure, retryInMs)
 *   'disconnect'      (reason: Error, retryInMs)
 */

import { EventEmitter } from 'node:events';
import type {
	BrokerTransport,
	ConnectionState,
	EncodedMessage,
	PipelineConfig,
	TransportFactory,
} from '@logwire/sdk';
import { computeBackoff } from './backoff.js';
import { brokerUrl } from './config.js';
import { ConnectFailure, errorMessage, NotConnectedError } from './errors.js';

export interface ConnectionManagerOptions {
	config: PipelineConfig;
	createTransport: TransportFactory;
	/** Internal diagnostics (never routed back into a pipeline) */
	onDiagnostic?: (message: string) => void;
}

export class ConnectionManager extends EventEmitter {
	private current: ConnectionState = 'disconnected';
	private transport: BrokerTransport | null = null;
	private retryTimer: ReturnType<typeof setTimeout> | null = null;
	private consecutiveFailures = 0;
	private connectedAt = 0;
	private attempts = 0;
	private failureCount = 0;
	private reconnectCount = 0;
	private everConnected = false;

	private readonly config: PipelineConfig;
	private readonly createTransport: TransportFactory;
	private readonly onDiagnostic: ((message: string) => void) | null;
	readonly endpoint: string;

	constructor(options: ConnectionManagerOptions) {
		super();
		this.config = options.config;
		this.createTransport = options.createTransport;
		this.onDiagnostic = options.onDiagnostic ?? null;
		this.endpoint = brokerUrl(options.config);
	}

	get state(): ConnectionState {
		return this.current;
	}

	get isConnected(): boolean {
		return this.current === 'connected';
	}

	/** Consecutive failures counted toward the current backoff */
	get failures(): number {
		return this.consecutiveFailures;
	}

	/** Total failed connection attempts */
	get connectFailures(): number {
		return this.failureCount;
	}

	/** Successful connections after the first one */
	get reconnects(): number {
		return this.reconnectCount;
	}

	/** Delay the next retry will wait, given the failures so far */
	nextDelay(): number {
		return computeBackoff(this.consecutiveFailures, this.config.backoffBase, this.config.backoffCap);
	}

	/**
	 * Start a connection attempt. No-op unless disconnected; a pending retry
	 * timer is replaced by the immediate attempt.
	 */
	connect(): void {
		if (this.current !== 'disconnected') return;
		this.clearRetryTimer();
		void this.attempt();
	}

	/**
	 * Publish a batch in order, one message at a time. `onAcked` runs after
	 * each message the transport accepted, so a failure part-way through
	 * tells the caller exactly which prefix went out. Requires the connected
	 * state; callers check `isConnected` first.
	 */
	async publish(batch: readonly EncodedMessage[], onAcked?: (message: EncodedMessage) => void): Promise<void> {
		for (const message of batch) {
			const transport = this.transport;
			if (this.current !== 'connected' || !transport) {
				throw new NotConnectedError(this.current);
			}
			await transport.publish(message.topic, message.payload, {
				qos: message.qos,
				retain: message.retain,
			});
			onAcked?.(message);
		}
	}

	/** Cancel retries, end the session, and enter the terminal closed state. */
	async close(): Promise<void> {
		if (this.current === 'closed') return;
		this.clearRetryTimer();
		const transport = this.transport;
		this.transport = null;
		this.setState('closed');
		if (transport) {
			await this.endQuietly(transport);
		}
	}

	private async attempt(): Promise<void> {
		this.attempts++;
		this.setState('connecting');

		const transport = this.createTransport(this.config);
		this.transport = transport;
		transport.onDisconnect((reason) => this.handleDisconnect(transport, reason));

		try {
			await transport.connect();
		} catch (err) {
			if (this.current === 'closed' || this.transport !== transport) return;
			this.transport = null;
			await this.endQuietly(transport);
			if (this.state === 'closed') return;

			this.consecutiveFailures++;
			this.failureCount++;
			const failure = new ConnectFailure(this.endpoint, this.attempts, { cause: err });
			const wait = this.nextDelay();
			this.diagnostic(`${failure.message}; retrying in ${wait}ms`);
			this.setState('disconnected');
			this.emit('connect_failure', failure, wait);
			this.scheduleRetry(wait);
			return;
		}

		if (this.current === 'closed' || this.transport !== transport) {
			await this.endQuietly(transport);
			return;
		}

		if (this.everConnected) this.reconnectCount++;
		this.everConnected = true;
		this.connectedAt = Date.now();
		this.setState('connected');
	}

	private handleDisconnect(transport: BrokerTransport, reason: Error): void {
		if (this.transport !== transport || this.current !== 'connected') return;
		this.transport = null;

		// A session that outlived one backoff interval resets the schedule;
		// a session that dropped sooner counts as another failure.
		const heldFor = Date.now() - this.connectedAt;
		if (heldFor > this.nextDelay()) {
			this.consecutiveFailures = 0;
		} else {
			this.consecutiveFailures++;
		}

		const wait = this.nextDelay();
		this.diagnostic(`Connection to ${this.endpoint} lost (${reason.message}); reconnecting in ${wait}ms`);
		this.setState('disconnected');
		this.emit('disconnect', reason, wait);
		void this.endQuietly(transport);
		this.scheduleRetry(wait);
	}

	private scheduleRetry(ms: number): void {
		this.clearRetryTimer();
		this.retryTimer = setTimeout(() => {
			this.retryTimer = null;
			this.connect();
		}, ms);
		if (this.retryTimer.unref) {
			this.retryTimer.unref();
		}
	}

	private clearRetryTimer(): void {
		if (this.retryTimer) {
			clearTimeout(this.retryTimer);
			this.retryTimer = null;
		}
	}

	private async endQuietly(transport: BrokerTransport): Promise<void> {
		try {
			await transport.end();
		} catch (err) {
			this.diagnostic(`Error closing connection to ${this.endpoint}: ${errorMessage(err)}`);
		}
	}

	private setState(next: ConnectionState): void {
		const previous = this.current;
		if (previous === next) return;
		this.current = next;
		this.emit('state', next, previous);
	}

	private diagnostic(message: string): void {
		this.onDiagnostic?.(message);
	}
}
