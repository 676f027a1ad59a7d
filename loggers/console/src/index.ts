/**
 * @logwire/sink-console — registration entry point.
 */

import type { SinkRegistration } from '@logwire/sdk';
import { ConsoleSink } from './console-sink.js';

export function register(): SinkRegistration {
	return {
		id: 'console',
		sink: ConsoleSink,
		configSchema: {
			type: 'object',
			properties: {
				stream: {
					type: 'string',
					enum: ['stdout', 'stderr'],
					description: 'Where to write (default: stderr)',
					default: 'stderr',
				},
				color: {
					type: 'boolean',
					description: 'Color the level names (default: when the stream is a TTY)',
				},
				level: {
					type: 'string',
					format: 'log-level',
					description: 'Minimum level this sink prints (default: everything the logger emits)',
				},
			},
			additionalProperties: false,
		},
	};
}

export { ConsoleSink } from './console-sink.js';
export { formatRecord } from './format.js';
