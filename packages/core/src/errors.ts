export type TapewatchErrorCode =
	| "RATE_LIMIT_EXHAUSTED"
	| "STREAM_LOST"
	| "DECODE_FAILED"
	| "ALERT_RULE_INVALID"
	| "CONFIG_INVALID"
	| "PERSISTENCE_FAILED";

export interface TapewatchErrorOptions {
	cause?: unknown;
}

export class TapewatchError extends Error {
	readonly code: TapewatchErrorCode;

	constructor(
		code: TapewatchErrorCode,
		message: string,
		options: TapewatchErrorOptions = {}
	) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * Raised once an outbound call has been rejected as rate limited on every
 * attempt. `cause` holds the last upstream error.
 */
export class RateLimitExhaustedError extends TapewatchError {
	constructor(
		readonly request: string,
		readonly attempts: number,
		cause: unknown
	) {
		super(
			"RATE_LIMIT_EXHAUSTED",
			`${request} still rate limited after ${attempts} attempts: ${errorMessage(cause)}`,
			{ cause }
		);
	}
}

export class StreamLostError extends TapewatchError {
	constructor(message: string, options: TapewatchErrorOptions = {}) {
		super("STREAM_LOST", message, options);
	}
}

export class DecodeError extends TapewatchError {
	constructor(message: string, options: TapewatchErrorOptions = {}) {
		super("DECODE_FAILED", message, options);
	}
}

export class AlertRuleError extends TapewatchError {
	constructor(message: string, options: TapewatchErrorOptions = {}) {
		super("ALERT_RULE_INVALID", message, options);
	}
}

export class ConfigError extends TapewatchError {
	constructor(message: string, options: TapewatchErrorOptions = {}) {
		super("CONFIG_INVALID", message, options);
	}
}

export class PersistenceError extends TapewatchError {
	constructor(
		readonly filePath: string,
		cause: unknown
	) {
		super("PERSISTENCE_FAILED", `Failed to write ${filePath}: ${errorMessage(cause)}`, {
			cause,
		});
	}
}

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
