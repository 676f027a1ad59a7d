/**
 * PipelineRegistry — maps logger names to their pipelines.
 *
 * An explicit object rather than process-global state: create one at startup,
 * pass it to whatever logs, and call shutdownAll() at exit. Each test can own
 * its own registry.
 *
 * getOrCreate() is synchronous, so the check and the insert happen in the
 * same turn of the event loop: callers racing on a new name always end up
 * with the same pipeline and a single connection.
 */

import type { TransportFactory } from '@logwire/sdk';
import { resolvePipelineConfig } from './config.js';
import type { PipelineMetrics } from './metrics.js';
import { Pipeline } from './pipeline.js';
import { MqttTransport } from './transport.js';

/** Default diagnostic channel: one prefixed line on stderr */
export function writeDiagnostic(message: string): void {
	process.stderr.write(`[logwire] ${message}\n`);
}

const createMqttTransport: TransportFactory = (config) => new MqttTransport(config);

export interface PipelineRegistryOptions {
	/** Transport per connection attempt (default: MQTT) */
	createTransport?: TransportFactory;
	/** Report every pipeline into these metrics */
	metrics?: PipelineMetrics;
	/** Internal diagnostics (default: stderr) */
	onDiagnostic?: (message: string) => void;
}

export class PipelineRegistry {
	private readonly pipelines = new Map<string, Pipeline>();
	private readonly createTransport: TransportFactory;
	private readonly metrics: PipelineMetrics | undefined;
	private readonly onDiagnostic: (message: string) => void;

	constructor(options: PipelineRegistryOptions = {}) {
		this.createTransport = options.createTransport ?? createMqttTransport;
		this.metrics = options.metrics;
		this.onDiagnostic = options.onDiagnostic ?? writeDiagnostic;
	}

	/**
	 * Return the pipeline registered under `name`, or build, register and
	 * start one from `config`. An existing pipeline keeps its configuration;
	 * the new one is ignored (first writer wins).
	 *
	 * Throws SchemaError or ConfigError when a new pipeline's configuration is
	 * invalid; nothing is registered in that case.
	 */
	getOrCreate(name: string, config?: unknown): Pipeline {
		const existing = this.pipelines.get(name);
		if (existing) return existing;

		const pipeline = new Pipeline({
			name,
			config: resolvePipelineConfig(config ?? {}),
			createTransport: this.createTransport,
			metrics: this.metrics,
			onDiagnostic: this.onDiagnostic,
		});
		this.pipelines.set(name, pipeline);
		pipeline.start();
		return pipeline;
	}

	/** Get a pipeline by name. */
	get(name: string): Pipeline | undefined {
		return this.pipelines.get(name);
	}

	/** Check if a name is registered. */
	has(name: string): boolean {
		return this.pipelines.has(name);
	}

	/** Registered names, in creation order. */
	names(): string[] {
		return [...this.pipelines.keys()];
	}

	/** Get count of registered pipelines. */
	get size(): number {
		return this.pipelines.size;
	}

	/**
	 * Shut a pipeline down and remove it. Returns false for an unknown name.
	 *
	 * The entry is removed before the drain starts, so a getOrCreate() for the
	 * same name during shutdown builds a fresh pipeline.
	 */
	async shutdown(name: string): Promise<boolean> {
		const pipeline = this.pipelines.get(name);
		if (!pipeline) return false;
		this.pipelines.delete(name);
		await pipeline.shutdown();
		return true;
	}

	/** Shut down every registered pipeline concurrently. */
	async shutdownAll(): Promise<void> {
		const names = this.names();
		await Promise.all(names.map((name) => this.shutdown(name)));
	}
}
