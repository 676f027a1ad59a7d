/**
 * @logwire/sdk — shared types, interfaces and test harness.
 *
 * Everything a pipeline, sink, or test needs to agree on.
 */

// Core types
export type {
	LogLevel,
	LogRecord,
	QoS,
	EncodedMessage,
	OverflowPolicy,
	BrokerTransportKind,
	ProtocolVersion,
	WillMessage,
	PipelineConfig,
	PipelineConfigInput,
	ConnectionState,
	PipelineStats,
	DurationString,
} from './types.js';

export {
	LOG_LEVELS,
	LEVEL_VALUES,
	isLogLevel,
	isLevelName,
	parseLevel,
	compareLevels,
	parseDuration,
} from './types.js';

// Records
export { createRecord, isLogRecord } from './record.js';
export type { CreateRecordOptions } from './record.js';

// Text formatting
export { formatLine, formatAttributes } from './format.js';

// Sink interface
export type { Sink, SinkRegistration } from './sink.js';

// Broker transport interface
export type { BrokerTransport, PublishOptions, TransportFactory } from './transport.js';

// Test harness
export { MockBroker, MockTransport, MockSink, createTestRecord } from './testing.js';
export type { PublishedMessage } from './testing.js';
