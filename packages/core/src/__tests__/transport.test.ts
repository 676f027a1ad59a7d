import { describe, expect, it } from 'vitest';
import { resolvePipelineConfig } from '../config.js';
import { MqttTransport, buildClientOptions } from '../transport.js';

describe('buildClientOptions', () => {
	it('disables the client reconnect loop and passes session settings through', () => {
		const options = buildClientOptions(
			resolvePipelineConfig({ keepalive: 30, protocolVersion: 5, connectTimeout: '3s' }),
		);

		expect(options).toEqual({
			keepalive: 30,
			protocolVersion: 5,
			connectTimeout: 3000,
			reconnectPeriod: 0,
			clean: true,
		});
	});

	it('sets clientId only when configured', () => {
		expect(buildClientOptions(resolvePipelineConfig({ clientId: 'app-01' })).clientId).toBe('app-01');
		expect(buildClientOptions(resolvePipelineConfig()).clientId).toBeUndefined();
	});

	it('encodes the last-will payload', () => {
		const options = buildClientOptions(
			resolvePipelineConfig({ will: { topic: 'status/app', payload: 'offline', qos: 1, retain: true } }),
		);

		expect(options.will?.topic).toBe('status/app');
		expect(options.will?.payload).toEqual(Buffer.from('offline', 'utf-8'));
		expect(options.will?.qos).toBe(1);
		expect(options.will?.retain).toBe(true);
	});
});

describe('MqttTransport', () => {
	it('targets the broker URL for the configured transport', () => {
		expect(new MqttTransport(resolvePipelineConfig({ hostname: 'broker.test', port: 1883 })).url).toBe(
			'mqtt://broker.test:1883',
		);
		expect(new MqttTransport(resolvePipelineConfig({ transport: 'websockets', port: 9001 })).url).toBe(
			'ws://localhost:9001',
		);
	});

	it('refuses to publish before connecting', async () => {
		const transport = new MqttTransport(resolvePipelineConfig());
		await expect(transport.publish('logs/app', Buffer.from('x'), { qos: 1, retain: false })).rejects.toThrowError(
			'MQTT client not connected',
		);
	});

	it('end is a no-op before connecting', async () => {
		const transport = new MqttTransport(resolvePipelineConfig());
		await expect(transport.end()).resolves.toBeUndefined();
	});
});
