import { MockSink, createTestRecord } from '@logwire/sdk';
import { describe, expect, it } from 'vitest';
import { SinkManager } from '../sinks.js';

describe('SinkManager', () => {
	it('fans each record out to every sink', async () => {
		const first = new MockSink('first');
		const second = new MockSink('second');
		const manager = new SinkManager();
		manager.addSink(first);
		manager.addSink(second);

		await manager.log(createTestRecord({ message: 'hello' }));

		expect(manager.size).toBe(2);
		expect(first.records.map((r) => r.message)).toEqual(['hello']);
		expect(second.records.map((r) => r.message)).toEqual(['hello']);
	});

	it('reports a failing sink without affecting the others', async () => {
		const diagnostics: string[] = [];
		const broken = new MockSink('broken');
		broken.failWith = new Error('disk full');
		const healthy = new MockSink('healthy');
		const manager = new SinkManager((m) => diagnostics.push(m));
		manager.addSink(broken);
		manager.addSink(healthy);

		await manager.log(createTestRecord({ message: 'still here' }));

		expect(healthy.records).toHaveLength(1);
		expect(diagnostics).toEqual(['Sink "broken" log failed: disk full']);
	});

	it('flushes and shuts down every sink', async () => {
		const sink = new MockSink();
		const manager = new SinkManager();
		manager.addSink(sink);

		await manager.flush();
		expect(sink.flushed).toBe(true);

		await manager.shutdown();
		expect(sink.shutdownCalled).toBe(true);
	});
});
