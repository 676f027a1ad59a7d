/**
 * Prometheus metrics for logwire pipelines.
 *
 * Opt-in: pass a PipelineMetrics to the registry to have every pipeline
 * report into it. `start()` additionally serves GET /metrics (port from the
 * option, LOGWIRE_METRICS_PORT, or 9100); `stop()` ends that and clears
 * the gauges of pipelines that are no longer running.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { Counter, collectDefaultMetrics, Gauge, Registry } from 'prom-client';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_METRICS_PORT = 9100;

export type DropReason = 'overflow' | 'encoding' | 'retries_exhausted' | 'shutdown';

export interface PipelineMetricsOptions {
	/** Also collect Node.js process metrics (GC, memory, event loop) */
	collectDefaults?: boolean;
}

export interface MetricsServerOptions {
	port?: number;
	host?: string;
}

export class PipelineMetrics {
	readonly registry: Registry;
	private server: Server | null = null;

	// ─── Metrics ─────────────────────────────────────────────────────────────

	readonly published: Counter<'pipeline'>;
	readonly dropped: Counter<'pipeline' | 'reason'>;
	readonly connectFailures: Counter<'pipeline'>;
	readonly queueDepth: Gauge<'pipeline'>;
	readonly connected: Gauge<'pipeline'>;

	constructor(options: PipelineMetricsOptions = {}) {
		this.registry = new Registry();

		if (options.collectDefaults) {
			collectDefaultMetrics({ register: this.registry });
		}

		this.published = new Counter({
			name: 'logwire_records_published_total',
			help: 'Records acknowledged by the broker transport',
			labelNames: ['pipeline'] as const,
			registers: [this.registry],
		});

		this.dropped = new Counter({
			name: 'logwire_records_dropped_total',
			help: 'Records dropped before delivery, by reason',
			labelNames: ['pipeline', 'reason'] as const,
			registers: [this.registry],
		});

		this.connectFailures = new Counter({
			name: 'logwire_connect_failures_total',
			help: 'Failed broker connection attempts',
			labelNames: ['pipeline'] as const,
			registers: [this.registry],
		});

		this.queueDepth = new Gauge({
			name: 'logwire_queue_depth',
			help: 'Messages waiting in the pipeline queue',
			labelNames: ['pipeline'] as const,
			registers: [this.registry],
		});

		this.connected = new Gauge({
			name: 'logwire_connected',
			help: '1 while the pipeline holds a broker connection, 0 otherwise',
			labelNames: ['pipeline'] as const,
			registers: [this.registry],
		});
	}

	recordPublished(pipeline: string, count: number): void {
		this.published.inc({ pipeline }, count);
	}

	recordDropped(pipeline: string, reason: DropReason, count = 1): void {
		this.dropped.inc({ pipeline, reason }, count);
	}

	recordConnectFailure(pipeline: string): void {
		this.connectFailures.inc({ pipeline });
	}

	setQueueDepth(pipeline: string, depth: number): void {
		this.queueDepth.set({ pipeline }, depth);
	}

	setConnected(pipeline: string, connected: boolean): void {
		this.connected.set({ pipeline }, connected ? 1 : 0);
	}

	/** Exposition text for every registered metric */
	metrics(): Promise<string> {
		return this.registry.metrics();
	}

	// ─── HTTP exposition ─────────────────────────────────────────────────────

	/**
	 * Serve GET /metrics and resolve with the bound port (0 picks a free
	 * one). Only one server per instance.
	 */
	async start(options: MetricsServerOptions = {}): Promise<number> {
		if (this.server) {
			throw new ConfigError(`Metrics are already served on port ${this.listeningPort}`);
		}
		const port = options.port ?? metricsPortFromEnv(process.env);
		const server = createServer((req, res) => void this.respond(req, res));

		await new Promise<void>((resolve, reject) => {
			server.once('error', reject);
			server.listen(port, options.host ?? '127.0.0.1', () => {
				server.off('error', reject);
				resolve();
			});
		});
		this.server = server;
		return this.listeningPort ?? port;
	}

	/**
	 * Stop serving and clear the per-pipeline gauges, which describe live
	 * pipelines only. Counters keep their totals.
	 */
	async stop(): Promise<void> {
		this.queueDepth.reset();
		this.connected.reset();

		const server = this.server;
		if (!server) return;
		this.server = null;
		await new Promise<void>((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
			server.closeAllConnections();
		});
	}

	/** Port the exposition server is bound to, or null when not serving */
	get listeningPort(): number | null {
		const address = this.server?.address();
		return address && typeof address === 'object' ? address.port : null;
	}

	private async respond(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const path = req.url?.split('?')[0];
		if (req.method !== 'GET' || path !== '/metrics') {
			res.writeHead(404).end('Not found');
			return;
		}
		try {
			const body = await this.registry.metrics();
			res.writeHead(200, { 'Content-Type': this.registry.contentType }).end(body);
		} catch (err) {
			res.writeHead(500).end(`Error collecting metrics: ${errorMessage(err)}`);
		}
	}
}

/** Port from LOGWIRE_METRICS_PORT, or DEFAULT_METRICS_PORT when unset */
export function metricsPortFromEnv(env: NodeJS.ProcessEnv): number {
	const raw = env.LOGWIRE_METRICS_PORT;
	if (raw === undefined || raw.trim() === '') return DEFAULT_METRICS_PORT;
	const port = Number(raw);
	if (!Number.isInteger(port) || port < 0 || port > 65535) {
		throw new ConfigError(`LOGWIRE_METRICS_PORT must be a port number, got "${raw}"`);
	}
	return port;
}
