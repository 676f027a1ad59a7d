/**
 * Broker transport — the minimal surface the connection manager needs from a
 * publish/subscribe client: connect, publish, end, and a disconnect signal.
 */

import type { PipelineConfig, QoS } from './types.js';

export interface PublishOptions {
	qos: QoS;
	retain: boolean;
}

export interface BrokerTransport {
	/** Resolves once the broker accepted the session; rejects on failure. */
	connect(): Promise<void>;

	/** Resolves once the transport has handed off (QoS 0) or been acked (QoS 1/2). */
	publish(topic: string, payload: Buffer, options: PublishOptions): Promise<void>;

	/** Close the session. Must resolve even if the connection is already gone. */
	end(): Promise<void>;

	/**
	 * Register the handler for connection loss after a successful connect
	 * (socket close, keep-alive timeout). Called at most once per session.
	 */
	onDisconnect(handler: (reason: Error) => void): void;
}

/** Creates a fresh transport for each connection attempt. */
export type TransportFactory = (config: PipelineConfig) => BrokerTransport;
