/**
 * Error taxonomy for logwire.
 *
 * Every error in the system extends LogwireError, giving callers
 * a consistent shape to catch and inspect. Only EncodingError and the
 * configuration errors ever reach the application; the rest are handled
 * inside the pipeline and surface as counters and diagnostics.
 */

export class LogwireError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'LogwireError';
		this.code = code;
	}
}

export class ConfigError extends LogwireError {
	constructor(message: string, options?: ErrorOptions) {
		super('CONFIG_ERROR', message, options);
		this.name = 'ConfigError';
	}
}

export class SchemaError extends LogwireError {
	readonly validationErrors: string[];

	constructor(message: string, validationErrors: string[] = [], options?: ErrorOptions) {
		super('SCHEMA_ERROR', message, options);
		this.name = 'SchemaError';
		this.validationErrors = validationErrors;
	}
}

/** A record cannot be represented on the wire. The record is dropped. */
export class EncodingError extends LogwireError {
	readonly loggerName: string;

	constructor(loggerName: string, message: string, options?: ErrorOptions) {
		super('ENCODING_ERROR', `[${loggerName}] ${message}`, options);
		this.name = 'EncodingError';
		this.loggerName = loggerName;
	}
}

/** publish() was called outside the connected state. */
export class NotConnectedError extends LogwireError {
	readonly state: string;

	constructor(state: string, options?: ErrorOptions) {
		super('NOT_CONNECTED', `Cannot publish while connection is ${state}`, options);
		this.name = 'NotConnectedError';
		this.state = state;
	}
}

/** A connection attempt failed. Triggers backoff; never surfaced to the application. */
export class ConnectFailure extends LogwireError {
	readonly attempt: number;

	constructor(endpoint: string, attempt: number, options?: ErrorOptions) {
		const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
		super('CONNECT_FAILURE', `Connection to ${endpoint} failed (attempt ${attempt})${reason}`, options);
		this.name = 'ConnectFailure';
		this.attempt = attempt;
	}
}

/** A batch was dropped after exhausting its retries. */
export class DeliveryExhausted extends LogwireError {
	readonly pipeline: string;
	readonly count: number;
	readonly attempts: number;

	constructor(pipeline: string, count: number, attempts: number, options?: ErrorOptions) {
		super(
			'DELIVERY_EXHAUSTED',
			`[${pipeline}] Dropped ${count} message(s) after ${attempts} failed attempt(s)`,
			options,
		);
		this.name = 'DeliveryExhausted';
		this.pipeline = pipeline;
		this.count = count;
		this.attempts = attempts;
	}
}

/** Render an unknown thrown value as a message string */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
