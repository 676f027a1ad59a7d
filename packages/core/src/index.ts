/**
 * @logwire/core — log-to-MQTT forwarding pipeline.
 *
 * Public API exports for library mode.
 */

// Registry and front end
export { PipelineRegistry, writeDiagnostic } from './registry.js';
export type { PipelineRegistryOptions } from './registry.js';
export { createLogger, LogHandle, resolveLevel } from './handle.js';
export type { Attributes, CreateLoggerOptions } from './handle.js';

// Pipeline parts
export { Pipeline } from './pipeline.js';
export type { PipelineOptions } from './pipeline.js';
export { encode, buildTopic, serializeRecord } from './encoder.js';
export { BoundedQueue } from './queue.js';
export { ConnectionManager } from './connection.js';
export type { ConnectionManagerOptions } from './connection.js';
export { DeliveryWorker } from './worker.js';
export type { DeliveryWorkerOptions, DeliveryDropReason } from './worker.js';
export { computeBackoff, delay } from './backoff.js';

// MQTT transport
export { MqttTransport, buildClientOptions } from './transport.js';

// Sinks
export { SinkManager } from './sinks.js';

// Config
export {
	DEFAULT_PIPELINE_CONFIG,
	pipelineConfigSchema,
	resolvePipelineConfig,
	brokerUrl,
	formatSchemaErrors,
} from './config.js';
export {
	loadConfig,
	parseConfig,
	createSink,
	validateSinkConfig,
	DEFAULT_CONFIG_FILE,
	BROKER_HOST_ENV,
	BROKER_PORT_ENV,
} from './schema.js';
export type { LoadConfigOptions, ParseConfigOptions, LogwireConfig, SinkDefinition } from './schema.js';

// Errors
export {
	LogwireError,
	ConfigError,
	SchemaError,
	EncodingError,
	NotConnectedError,
	ConnectFailure,
	DeliveryExhausted,
	errorMessage,
} from './errors.js';

// Metrics
export { PipelineMetrics, DEFAULT_METRICS_PORT, metricsPortFromEnv } from './metrics.js';
export type { DropReason, PipelineMetricsOptions, MetricsServerOptions } from './metrics.js';
