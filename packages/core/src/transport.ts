/**
 * MQTT transport — adapts the mqtt client to the BrokerTransport surface.
 *
 * The client's own reconnect loop is disabled (reconnectPeriod: 0): the
 * connection manager owns retries and backoff, and asks for a fresh
 * transport per attempt.
 */

import type { BrokerTransport, PipelineConfig, PublishOptions } from '@logwire/sdk';
import mqtt from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import { brokerUrl } from './config.js';

export function buildClientOptions(config: PipelineConfig): IClientOptions {
	const options: IClientOptions = {
		keepalive: config.keepalive,
		protocolVersion: config.protocolVersion,
		connectTimeout: config.connectTimeout,
		reconnectPeriod: 0,
		clean: true,
	};
	if (config.clientId) {
		options.clientId = config.clientId;
	}
	if (config.will) {
		options.will = {
			topic: config.will.topic,
			payload: Buffer.from(config.will.payload, 'utf-8'),
			qos: config.will.qos,
			retain: config.will.retain,
		};
	}
	return options;
}

export class MqttTransport implements BrokerTransport {
	private client: MqttClient | null = null;
	private disconnectHandler: ((reason: Error) => void) | null = null;
	private lastError: Error | null = null;
	private sessionUp = false;
	private ending = false;

	readonly url: string;
	private readonly options: IClientOptions;

	constructor(config: PipelineConfig) {
		this.url = brokerUrl(config);
		this.options = buildClientOptions(config);
	}

	connect(): Promise<void> {
		const client = mqtt.connect(this.url, this.options);
		this.client = client;

		// Keep an error listener attached for the whole session so the client
		// never emits an unhandled 'error'; the last one becomes the disconnect reason.
		client.on('error', (err: Error) => {
			this.lastError = err;
		});

		return new Promise<void>((resolve, reject) => {
			const cleanup = () => {
				client.off('connect', onConnect);
				client.off('close', onEarlyClose);
			};
			const onConnect = () => {
				cleanup();
				this.sessionUp = true;
				client.on('close', () => this.handleClose());
				resolve();
			};
			const onEarlyClose = () => {
				cleanup();
				client.end(true);
				reject(this.lastError ?? new Error(`Connection to ${this.url} closed before CONNACK`));
			};
			client.on('connect', onConnect);
			client.on('close', onEarlyClose);
		});
	}

	async publish(topic: string, payload: Buffer, options: PublishOptions): Promise<void> {
		if (!this.client || !this.sessionUp) {
			throw new Error('MQTT client not connected');
		}
		await this.client.publishAsync(topic, payload, { qos: options.qos, retain: options.retain });
	}

	async end(): Promise<void> {
		const client = this.client;
		if (!client) return;
		this.ending = true;
		this.client = null;
		await client.endAsync(!this.sessionUp);
		this.sessionUp = false;
	}

	onDisconnect(handler: (reason: Error) => void): void {
		this.disconnectHandler = handler;
	}

	private handleClose(): void {
		if (!this.sessionUp) return;
		this.sessionUp = false;
		if (this.ending) return;
		const handler = this.disconnectHandler;
		this.disconnectHandler = null;
		handler?.(this.lastError ?? new Error(`Connection to ${this.url} lost`));
	}
}
