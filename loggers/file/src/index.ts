/**
 * @logwire/sink-file — registration entry point.
 */

import type { SinkRegistration } from '@logwire/sdk';
import { FileSink } from './file-sink.js';

export function register(): SinkRegistration {
	return {
		id: 'file',
		sink: FileSink,
		configSchema: {
			type: 'object',
			properties: {
				path: {
					type: 'string',
					description: 'Log file path (default: logs/<YYYYMMDD-HHMMSS>-<name>.log)',
				},
				name: {
					type: 'string',
					description: 'Name used in the default file name',
				},
				format: {
					type: 'string',
					enum: ['text', 'jsonl'],
					description: 'One formatted line per record, or one JSON object per line',
					default: 'text',
				},
				buffer: {
					type: 'object',
					properties: {
						size: { type: 'integer', minimum: 1, description: 'Buffer N lines before flushing', default: 100 },
						flush_interval: {
							type: 'string',
							description: 'Flush at least every N (e.g., "1s")',
							default: '1s',
						},
					},
					additionalProperties: false,
				},
			},
			additionalProperties: false,
		},
	};
}

export { defaultLogPath, FileSink } from './file-sink.js';
export type { FileFormat } from './file-sink.js';
