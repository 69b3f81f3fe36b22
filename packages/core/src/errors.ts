export type TechnicalAnalysisErrorCode =
	| "INSUFFICIENT_DATA"
	| "UNSUPPORTED_SYMBOL"
	| "INDICATOR_FETCH"
	| "PERSIST"
	| "RATE_LIMIT_EXCEEDED";

/**
 * Base class for every error the pipeline raises. `fatal` errors abort the
 * operation and reach the caller; the rest are absorbed and reported through
 * record metadata or logs.
 */
export abstract class TechnicalAnalysisError extends Error {
	abstract readonly code: TechnicalAnalysisErrorCode;
	abstract readonly fatal: boolean;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class InsufficientDataError extends TechnicalAnalysisError {
	readonly code = "INSUFFICIENT_DATA";
	readonly fatal = true;

	constructor(
		readonly required: number,
		readonly received: number
	) {
		super(
			`Insufficient data: need at least ${required} candles, got ${received}`
		);
	}
}

export class UnsupportedSymbolError extends TechnicalAnalysisError {
	readonly code = "UNSUPPORTED_SYMBOL";
	readonly fatal = true;

	constructor(readonly symbol: string) {
		super(`Unsupported cryptocurrency: ${symbol}`);
	}
}

export class IndicatorFetchError extends TechnicalAnalysisError {
	readonly code = "INDICATOR_FETCH";
	readonly fatal = false;

	constructor(
		readonly indicatorKey: string,
		readonly reason: string,
		readonly status?: number,
		options?: { cause?: unknown }
	) {
		super(`Failed to fetch ${indicatorKey}: ${reason}`, options);
	}
}

export class PersistError extends TechnicalAnalysisError {
	readonly code = "PERSIST";
	readonly fatal = false;

	constructor(
		readonly symbol: string,
		message: string,
		options?: { cause?: unknown }
	) {
		super(`Failed to persist record for ${symbol}: ${message}`, options);
	}
}

export class RateLimitExceeded extends TechnicalAnalysisError {
	readonly code = "RATE_LIMIT_EXCEEDED";
	readonly fatal = false;

	constructor(readonly retryAfterMs?: number) {
		super(
			retryAfterMs === undefined
				? "Rate limit exceeded"
				: `Rate limit exceeded, retry after ${retryAfterMs}ms`
		);
	}
}

export const isTechnicalAnalysisError = (
	value: unknown
): value is TechnicalAnalysisError => value instanceof TechnicalAnalysisError;

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
