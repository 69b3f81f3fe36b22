import {
	IndicatorFetchError,
	describeError,
	silentLogger,
	systemClock,
	type Clock,
	type FetchErrorEntry,
	type IndicatorPayload,
	type IndicatorSource,
	type ModuleLogger,
} from "@cryptota/core";
import { isCompletePayload, type IndicatorSpec } from "./indicatorSpecs";
import type { RateLimiter } from "./rateLimiter";

export type FetchOutcome =
	| { ok: true; value: IndicatorPayload; attempts: number }
	| { ok: false; error: IndicatorFetchError; attempts: number };

export interface FetchAllResult {
	values: Map<string, FetchOutcome>;
	fetched: number;
	requested: number;
	successRatio: number;
	errors: FetchErrorEntry[];
}

export interface FetchTarget {
	symbolPair: string;
	exchange: string;
	interval: string;
}

export interface FetchOrchestratorOptions {
	source: IndicatorSource;
	rateLimiter: Pick<RateLimiter, "waitForSlot">;
	target: FetchTarget;
	maxRetries?: number;
	retryDelayMs?: number;
	clock?: Clock;
	logger?: ModuleLogger;
}

export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_DELAY_MS = 30_000;

/** Normalizes any failure to an error keyed by the request key, not the endpoint. */
const toFetchError = (key: string, error: unknown): IndicatorFetchError => {
	if (error instanceof IndicatorFetchError) {
		return error.indicatorKey === key
			? error
			: new IndicatorFetchError(key, error.reason, error.status, {
					cause: error,
				});
	}
	return new IndicatorFetchError(key, describeError(error), undefined, {
		cause: error,
	});
};

/**
 * Sequential, retrying acquisition of one indicator per request against a
 * shared quota. Every request waits for a rate-limiter slot; failed keys are
 * retried in whole rounds with a fixed pause, succeeded keys never again.
 * Partial or total failure is reported in the result, never thrown.
 */
export class IndicatorFetchOrchestrator {
	private readonly source: IndicatorSource;
	private readonly rateLimiter: Pick<RateLimiter, "waitForSlot">;
	private readonly target: FetchTarget;
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;
	private readonly clock: Clock;
	private readonly logger: ModuleLogger;

	constructor(options: FetchOrchestratorOptions) {
		this.source = options.source;
		this.rateLimiter = options.rateLimiter;
		this.target = options.target;
		this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
		this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
		this.clock = options.clock ?? systemClock;
		this.logger = options.logger ?? silentLogger;
	}

	async fetchAll(specs: readonly IndicatorSpec[]): Promise<FetchAllResult> {
		const values = new Map<string, FetchOutcome>();

		this.logger.info("fetch_started", {
			symbol: this.target.symbolPair,
			requested: specs.length,
		});
		for (const spec of specs) {
			values.set(spec.key, await this.fetchOne(spec, 1));
		}

		for (let round = 1; round <= this.maxRetries; round += 1) {
			const missing = specs.filter((spec) => !values.get(spec.key)?.ok);
			if (!missing.length) {
				break;
			}
			const missingKeys = missing.map((spec) => spec.key);
			if (round === this.maxRetries) {
				this.logger.warn("retries_exhausted", {
					symbol: this.target.symbolPair,
					missing: missingKeys,
				});
				break;
			}

			this.logger.info("retry_round_started", {
				symbol: this.target.symbolPair,
				round,
				maxRetries: this.maxRetries,
				missing: missingKeys,
				delayMs: this.retryDelayMs,
			});
			await this.clock.sleep(this.retryDelayMs);

			for (const spec of missing) {
				const previous = values.get(spec.key);
				const attempt = (previous?.attempts ?? 0) + 1;
				values.set(spec.key, await this.fetchOne(spec, attempt));
			}
		}

		return this.summarize(specs, values);
	}

	private async fetchOne(
		spec: IndicatorSpec,
		attempt: number
	): Promise<FetchOutcome> {
		await this.rateLimiter.waitForSlot();
		const { symbolPair, exchange, interval } = this.target;
		try {
			const payload = await this.source.fetch(
				spec.indicator,
				symbolPair,
				exchange,
				interval,
				spec.params
			);
			if (!isCompletePayload(spec, payload)) {
				throw new IndicatorFetchError(spec.key, "incomplete payload");
			}
			this.logger.debug("indicator_fetched", { key: spec.key, attempt });
			return { ok: true, value: payload, attempts: attempt };
		} catch (error) {
			const fetchError = toFetchError(spec.key, error);
			this.logger.warn("indicator_fetch_failed", {
				key: spec.key,
				attempt,
				status: fetchError.status,
				error: fetchError.message,
			});
			return { ok: false, error: fetchError, attempts: attempt };
		}
	}

	private summarize(
		specs: readonly IndicatorSpec[],
		values: Map<string, FetchOutcome>
	): FetchAllResult {
		const errors: FetchErrorEntry[] = [];
		let fetched = 0;
		for (const spec of specs) {
			const outcome = values.get(spec.key);
			if (!outcome) {
				continue;
			}
			if (outcome.ok) {
				fetched += 1;
				continue;
			}
			errors.push({
				key: spec.key,
				message: outcome.error.message,
				attempts: outcome.attempts,
				...(outcome.error.status === undefined
					? {}
					: { status: outcome.error.status }),
			});
		}

		const requested = specs.length;
		const successRatio = requested === 0 ? 0 : fetched / requested;
		this.logger.info("fetch_complete", {
			symbol: this.target.symbolPair,
			fetched,
			requested,
			successRatio,
			missing: errors.map((entry) => entry.key),
		});

		return { values, fetched, requested, successRatio, errors };
	}
}
