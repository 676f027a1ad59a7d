import { ConfigError, parseConfig, PipelineRegistry } from '@logwire/core';
import { MockBroker } from '@logwire/sdk';
import { describe, expect, it } from 'vitest';
import { parseAttributes, runSend } from '../commands/send.js';

// ─── parseAttributes ─────────────────────────────────────────────────────────

describe('parseAttributes', () => {
	it('splits on the first equals sign', () => {
		expect(parseAttributes(['host=db-1', 'query=a=b'])).toEqual({ host: 'db-1', query: 'a=b' });
	});

	it('rejects pairs without a key', () => {
		expect(() => parseAttributes(['=value'])).toThrow('Invalid attribute "=value": expected key=value');
		expect(() => parseAttributes(['flag'])).toThrow(ConfigError);
	});
});

// ─── runSend ─────────────────────────────────────────────────────────────────

describe('runSend', () => {
	it('delivers one record and reports the final statistics', async () => {
		const broker = new MockBroker();
		const registry = new PipelineRegistry({ createTransport: broker.createTransport });
		const config = parseConfig('', { env: {} });

		const result = await runSend('disk almost full', {
			name: 'app.web',
			level: 'warn',
			attributes: ['host=db-1', 'free=5%'],
			config,
			registry,
		});

		expect(result.sent).toBe(true);
		expect(result.stats.accepted).toBe(1);
		expect(result.stats.published).toBe(1);
		expect(result.stats.connection).toBe('closed');

		expect(broker.published).toHaveLength(1);
		expect(broker.published[0].topic).toBe('logs/app/web');
		expect(broker.published[0].qos).toBe(1);
		expect(broker.published[0].retain).toBe(true);
		expect(JSON.parse(broker.payloads()[0])).toMatchObject({
			level: 'WARNING',
			logger: 'app.web',
			message: 'disk almost full',
			attributes: { free: '5%', host: 'db-1' },
		});

		expect(registry.has('app.web')).toBe(false);
	});

	it('skips records below the configured level', async () => {
		const broker = new MockBroker();
		const registry = new PipelineRegistry({ createTransport: broker.createTransport });
		const config = parseConfig('level: error', { env: {} });

		const result = await runSend('routine', { name: 'app', level: 'info', attributes: [], config, registry });

		expect(result.sent).toBe(false);
		expect(result.stats.accepted).toBe(0);
		expect(broker.published).toHaveLength(0);
	});

	it('validates input before opening a pipeline', async () => {
		const broker = new MockBroker();
		const registry = new PipelineRegistry({ createTransport: broker.createTransport });
		const config = parseConfig('', { env: {} });

		await expect(
			runSend('x', { name: 'app', level: 'info', attributes: ['novalue'], config, registry }),
		).rejects.toThrow(ConfigError);
		await expect(
			runSend('x', { name: 'app', level: 'chatty', attributes: [], config, registry }),
		).rejects.toThrow('Unknown log level: "chatty"');

		expect(registry.size).toBe(0);
		expect(broker.connectAttempts).toBe(0);
	});
});
