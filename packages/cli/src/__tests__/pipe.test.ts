import { PassThrough, Readable } from 'node:stream';
import { parseConfig, PipelineRegistry } from '@logwire/core';
import { MockBroker } from '@logwire/sdk';
import { describe, expect, it } from 'vitest';
import { runPipe } from '../commands/pipe.js';

function setup() {
	const broker = new MockBroker();
	const registry = new PipelineRegistry({ createTransport: broker.createTransport });
	const config = parseConfig('pipeline: { topic: "tail/{loggerName}" }', { env: {} });
	return { broker, registry, config };
}

function messages(broker: MockBroker): string[] {
	return broker.payloads().map((p) => {
		const body: unknown = JSON.parse(p);
		return typeof body === 'object' && body !== null && 'message' in body ? String(body.message) : '';
	});
}

describe('runPipe', () => {
	it('forwards every non-empty line in order', async () => {
		const { broker, registry, config } = setup();

		const result = await runPipe({
			name: 'nginx',
			level: 'info',
			config,
			registry,
			input: Readable.from(['GET / 200\n\nGET /missing 404\r\n', 'POST /login 302\n']),
		});

		expect(result.lines).toBe(3);
		expect(result.sent).toBe(3);
		expect(result.stats.published).toBe(3);
		expect(messages(broker)).toEqual(['GET / 200', 'GET /missing 404', 'POST /login 302']);
		expect(broker.published.map((m) => m.topic)).toEqual(['tail/nginx', 'tail/nginx', 'tail/nginx']);
	});

	it('stops reading when the signal aborts', async () => {
		const { broker, registry, config } = setup();
		const input = new PassThrough();
		const controller = new AbortController();

		const running = runPipe({ name: 'app', level: 'info', config, registry, input, signal: controller.signal });
		input.write('before abort\n');
		await new Promise((resolve) => setTimeout(resolve, 20));
		controller.abort();

		const result = await running;
		expect(result.lines).toBe(1);
		expect(messages(broker)).toEqual(['before abort']);
	});
});
