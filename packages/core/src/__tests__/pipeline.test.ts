import { MockBroker, createTestRecord } from '@logwire/sdk';
import type { PipelineConfigInput } from '@logwire/sdk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resolvePipelineConfig } from '../config.js';
import { EncodingError } from '../errors.js';
import { Pipeline } from '../pipeline.js';

const flush = () => vi.advanceTimersByTimeAsync(0);

function messages(broker: MockBroker): string[] {
	return broker.payloads().map((p) => JSON.parse(p).message);
}

describe('Pipeline', () => {
	let broker: MockBroker;
	let diagnostics: string[];

	beforeEach(() => {
		vi.useFakeTimers();
		broker = new MockBroker();
		diagnostics = [];
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	function createPipeline(input: PipelineConfigInput = {}): Pipeline {
		return new Pipeline({
			name: 'app',
			config: resolvePipelineConfig({ backoffBase: 100, backoffCap: 1000, ...input }),
			createTransport: broker.createTransport,
			onDiagnostic: (m) => diagnostics.push(m),
		});
	}

	// ─── Delivery ──────────────────────────────────────────────────────────────

	it('delivers a pushed record once connected', async () => {
		const pipeline = createPipeline();
		pipeline.start();
		await flush();

		expect(pipeline.push(createTestRecord({ message: 'hello' }))).toBe(true);
		await flush();

		expect(messages(broker)).toEqual(['hello']);
		expect(broker.published[0].topic).toBe('logs/test/logger');
		expect(pipeline.stats()).toMatchObject({ accepted: 1, published: 1, queueDepth: 0, connection: 'connected' });
	});

	it('holds records while the broker is unreachable and delivers them after two refused connects', async () => {
		broker.refuseConnections(2);
		const pipeline = createPipeline();
		pipeline.start();
		pipeline.push(createTestRecord({ message: 'early' }));

		await flush();
		expect(pipeline.stats().queueDepth).toBe(1);

		await vi.advanceTimersByTimeAsync(200);
		expect(broker.connectAttempts).toBe(2);
		expect(broker.published).toHaveLength(0);

		await vi.advanceTimersByTimeAsync(400);
		expect(broker.connectAttempts).toBe(3);
		expect(messages(broker)).toEqual(['early']);
		expect(pipeline.stats()).toMatchObject({
			accepted: 1,
			published: 1,
			droppedDelivery: 0,
			connectFailures: 2,
			queueDepth: 0,
		});
	});

	it('preserves push order across batches', async () => {
		const pipeline = createPipeline({ batchSize: 7 });
		const expected: string[] = [];
		for (let i = 0; i < 30; i++) {
			expected.push(`m${i}`);
			pipeline.push(createTestRecord({ message: `m${i}` }));
		}
		pipeline.start();
		await flush();

		for (let i = 30; i < 40; i++) {
			expected.push(`m${i}`);
			pipeline.push(createTestRecord({ message: `m${i}` }));
		}
		await flush();

		expect(messages(broker)).toEqual(expected);
		expect(pipeline.stats().published).toBe(40);
	});

	it('delivers records pushed during an outage once reconnected', async () => {
		const pipeline = createPipeline();
		pipeline.start();
		await flush();

		broker.refuseConnections(1);
		broker.disconnect();
		pipeline.push(createTestRecord({ message: 'while down' }));
		await flush();
		expect(broker.published).toHaveLength(0);

		// Refused at 200ms, connected at 600ms
		await vi.advanceTimersByTimeAsync(600);
		expect(pipeline.connection.state).toBe('connected');
		expect(messages(broker)).toEqual(['while down']);
		expect(broker.published[0].session).toBe(2);
	});

	// ─── Overflow ──────────────────────────────────────────────────────────────

	it('drop_oldest keeps the newest records', async () => {
		const pipeline = createPipeline({ queueCapacity: 3, overflow: 'drop_oldest' });
		for (const m of ['A', 'B', 'C', 'D']) {
			expect(pipeline.push(createTestRecord({ message: m }))).toBe(true);
		}
		pipeline.start();
		await flush();

		expect(messages(broker)).toEqual(['B', 'C', 'D']);
		expect(pipeline.stats().droppedOverflow).toBe(1);
		expect(pipeline.stats().accepted).toBe(4);
	});

	it('drop_newest refuses records once full', async () => {
		const pipeline = createPipeline({ queueCapacity: 3, overflow: 'drop_newest' });
		expect(pipeline.push(createTestRecord({ message: 'A' }))).toBe(true);
		expect(pipeline.push(createTestRecord({ message: 'B' }))).toBe(true);
		expect(pipeline.push(createTestRecord({ message: 'C' }))).toBe(true);
		expect(pipeline.push(createTestRecord({ message: 'D' }))).toBe(false);
		pipeline.start();
		await flush();

		expect(messages(broker)).toEqual(['A', 'B', 'C']);
		expect(pipeline.stats()).toMatchObject({ accepted: 3, droppedOverflow: 1 });
	});

	// ─── Retries ───────────────────────────────────────────────────────────────

	it('drops a batch after maxRetries + 1 failed attempts and counts its messages', async () => {
		broker.failPublishes(Number.POSITIVE_INFINITY);
		const pipeline = createPipeline({ maxRetries: 2 });
		for (const m of ['a', 'b', 'c']) {
			pipeline.push(createTestRecord({ message: m }));
		}
		pipeline.start();
		await flush();
		expect(broker.transports[0].publishCalls).toBe(1);

		await vi.advanceTimersByTimeAsync(200);
		expect(broker.transports[0].publishCalls).toBe(2);

		await vi.advanceTimersByTimeAsync(400);
		expect(broker.transports[0].publishCalls).toBe(3);
		expect(pipeline.stats()).toMatchObject({ published: 0, droppedDelivery: 3, queueDepth: 0 });
		expect(diagnostics).toContain('[app] Dropped 3 message(s) after 3 failed attempt(s)');

		await vi.advanceTimersByTimeAsync(5000);
		expect(broker.transports[0].publishCalls).toBe(3);
	});

	it('delivers the batch when a retry succeeds', async () => {
		broker.failPublishes(1);
		const pipeline = createPipeline();
		pipeline.push(createTestRecord({ message: 'one' }));
		pipeline.push(createTestRecord({ message: 'two' }));
		pipeline.start();
		await flush();
		expect(broker.published).toHaveLength(0);

		await vi.advanceTimersByTimeAsync(200);

		expect(messages(broker)).toEqual(['one', 'two']);
		expect(pipeline.stats()).toMatchObject({ published: 2, droppedDelivery: 0 });
		expect(diagnostics).toEqual([
			'[app] Publish of 2 message(s) failed (attempt 1/4): publish rejected',
		]);
	});

	it('fails a retry without publishing while the connection is down', async () => {
		const pipeline = createPipeline({ maxRetries: 2 });
		pipeline.start();
		await flush();

		broker.failPublishes(1);
		pipeline.push(createTestRecord({ message: 'x' }));
		await flush();

		broker.refuseConnections(Number.POSITIVE_INFINITY);
		broker.disconnect();
		await vi.advanceTimersByTimeAsync(600);

		const totalPublishCalls = broker.transports.reduce((sum, t) => sum + t.publishCalls, 0);
		expect(totalPublishCalls).toBe(1);
		expect(pipeline.stats().droppedDelivery).toBe(1);
		expect(diagnostics).toContain(
			'[app] Publish of 1 message(s) failed (attempt 2/3): Cannot publish while connection is disconnected',
		);
	});

	// ─── Encoding ──────────────────────────────────────────────────────────────

	it('counts and rethrows encoding failures', () => {
		const pipeline = createPipeline();
		expect(() => pipeline.push(createTestRecord({ message: '\uD83D' }))).toThrowError(EncodingError);
		expect(pipeline.stats()).toMatchObject({ accepted: 0, droppedEncoding: 1, queueDepth: 0 });
	});

	// ─── Shutdown ──────────────────────────────────────────────────────────────

	it('waits for a connection to make the final drain', async () => {
		broker.refuseConnections(1);
		const pipeline = createPipeline();
		pipeline.start();
		pipeline.push(createTestRecord({ message: 'last words' }));

		const done = pipeline.shutdown();
		await vi.advanceTimersByTimeAsync(200);
		await done;

		expect(messages(broker)).toEqual(['last words']);
		expect(pipeline.stats()).toMatchObject({ published: 1, droppedDelivery: 0, connection: 'closed' });
		expect(broker.transports[1].ended).toBe(true);
	});

	it('gives up at the shutdown timeout and closes anyway', async () => {
		broker.refuseConnections(Number.POSITIVE_INFINITY);
		const pipeline = createPipeline({ shutdownTimeout: 1000 });
		pipeline.start();
		pipeline.push(createTestRecord({ message: 'a' }));
		pipeline.push(createTestRecord({ message: 'b' }));

		const done = pipeline.shutdown();
		await vi.advanceTimersByTimeAsync(1000);
		await done;

		expect(pipeline.stats()).toMatchObject({ droppedDelivery: 2, queueDepth: 0, connection: 'closed' });
		expect(diagnostics).toContain('[app] Dropped 2 undelivered message(s) at shutdown');

		const attempts = broker.connectAttempts;
		await vi.advanceTimersByTimeAsync(60_000);
		expect(broker.connectAttempts).toBe(attempts);
	});

	it('does not wait forever on a publish that never completes', async () => {
		const pipeline = createPipeline({ shutdownTimeout: 500 });
		pipeline.start();
		await flush();

		broker.stallPublishes = true;
		pipeline.push(createTestRecord({ message: 'stuck' }));
		await flush();

		const done = pipeline.shutdown();
		await vi.advanceTimersByTimeAsync(500);
		await done;

		expect(pipeline.stats()).toMatchObject({ published: 0, droppedDelivery: 1, connection: 'closed' });
	});

	it('refuses records after shutdown and shuts down once', async () => {
		const pipeline = createPipeline();
		pipeline.start();
		await flush();

		const first = pipeline.shutdown();
		expect(pipeline.shutdown()).toBe(first);
		await first;

		expect(pipeline.isShutdown).toBe(true);
		expect(pipeline.push(createTestRecord())).toBe(false);
		expect(pipeline.stats().accepted).toBe(0);
	});
	it('keeps published plus dropped equal to accepted when a late ack lands during close', async () => {
		const pipeline = createPipeline({ shutdownTimeout: 500 });
		pipeline.start();
		await flush();

		broker.holdPublishes = true;
		pipeline.push(createTestRecord({ message: 'late' }));
		await flush();

		const done = pipeline.shutdown();
		await vi.advanceTimersByTimeAsync(500);
		await done;
		await vi.advanceTimersByTimeAsync(1000);

		const stats = pipeline.stats();
		expect(stats).toMatchObject({ accepted: 1, published: 0, droppedDelivery: 1, queueDepth: 0 });
		expect(stats.published + stats.droppedDelivery).toBe(stats.accepted);
	});

	it('delivers each message of a partly failed batch exactly once', async () => {
		broker.failPublishes(1, 1);
		const pipeline = createPipeline();
		for (const m of ['A', 'B', 'C']) {
			pipeline.push(createTestRecord({ message: m }));
		}
		pipeline.start();
		await flush();

		await vi.advanceTimersByTimeAsync(200);

		expect(messages(broker)).toEqual(['A', 'B', 'C']);
		expect(pipeline.stats()).toMatchObject({ published: 3, droppedDelivery: 0 });
		expect(diagnostics).toEqual([
			'[app] Publish of 3 message(s) failed (attempt 1/4): publish rejected',
		]);
	});

	it('counts records queued on a never-started pipeline as dropped at shutdown', async () => {
		const pipeline = createPipeline();
		pipeline.push(createTestRecord({ message: 'a' }));
		pipeline.push(createTestRecord({ message: 'b' }));

		await pipeline.shutdown();

		expect(pipeline.stats()).toMatchObject({
			accepted: 2,
			published: 0,
			droppedDelivery: 2,
			queueDepth: 0,
			connection: 'closed',
		});
		expect(diagnostics).toEqual(['[app] Dropped 2 undelivered message(s) at shutdown']);
		expect(broker.connectAttempts).toBe(0);
	});
});
