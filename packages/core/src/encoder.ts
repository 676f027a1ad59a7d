/**
 * Record encoder — turns a LogRecord into a broker message.
 *
 * Pure: the same record and configuration always produce the same topic and
 * byte-identical payload.
 */

import type { EncodedMessage, LogRecord, PipelineConfig } from '@logwire/sdk';
import { EncodingError } from './errors.js';

/** Lone high surrogate, or a low surrogate without a preceding high one */
const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const TOPIC_PLACEHOLDER = /\{(loggerName|loggerPath|level)\}/g;

function assertWellFormed(record: LogRecord, field: string, value: string): void {
	if (UNPAIRED_SURROGATE.test(value)) {
		throw new EncodingError(record.loggerName, `${field} contains an unpaired surrogate`);
	}
}

/**
 * Expand a topic template for a record.
 *
 * {loggerName} is the name as given, {loggerPath} replaces dots with slashes
 * so "app.db" nests as "app/db", {level} is the level name.
 */
export function buildTopic(template: string, record: LogRecord): string {
	return template.replace(TOPIC_PLACEHOLDER, (_match, key: string) => {
		switch (key) {
			case 'loggerName':
				return record.loggerName;
			case 'loggerPath':
				return record.loggerName.replace(/\./g, '/');
			default:
				return record.level;
		}
	});
}

/**
 * Serialize a record. Field order is fixed and attribute keys are sorted,
 * which is what makes the payload deterministic.
 */
export function serializeRecord(record: LogRecord): string {
	const body: Record<string, unknown> = {
		timestamp: record.timestamp,
		level: record.level,
		logger: record.loggerName,
		message: record.message,
	};

	const attributes = record.attributes;
	if (attributes && Object.keys(attributes).length > 0) {
		const sorted: Record<string, string> = {};
		for (const key of Object.keys(attributes).sort()) {
			sorted[key] = attributes[key];
		}
		body.attributes = sorted;
	}

	return JSON.stringify(body);
}

export function encode(record: LogRecord, config: PipelineConfig): EncodedMessage {
	assertWellFormed(record, 'message', record.message);
	assertWellFormed(record, 'logger name', record.loggerName);
	for (const [key, value] of Object.entries(record.attributes ?? {})) {
		assertWellFormed(record, `attribute key "${key}"`, key);
		assertWellFormed(record, `attribute "${key}"`, value);
	}

	const topic = buildTopic(config.topic, record);
	if (topic.length === 0) {
		throw new EncodingError(record.loggerName, 'topic is empty');
	}
	if (/[+#]/.test(topic)) {
		throw new EncodingError(record.loggerName, `topic "${topic}" contains a wildcard character`);
	}

	return {
		topic,
		payload: Buffer.from(serializeRecord(record), 'utf-8'),
		qos: config.qos,
		retain: config.retain,
	};
}
