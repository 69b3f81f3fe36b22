import {
	describeError,
	loadCryptoRegistry,
	silentLogger,
	systemClock,
	type Clock,
	type CryptoRegistry,
	type IndicatorPayload,
	type IndicatorSource,
	type ModuleLogger,
	type PriceSource,
	type RemoteRecordMetadata,
	type TechnicalAnalysisRecord,
	type WallClock,
} from "@cryptota/core";
import { assembleRecord } from "../schema";
import { UnionVotePolicy } from "../summary";
import {
	DEFAULT_MAX_RETRIES,
	DEFAULT_RETRY_DELAY_MS,
	IndicatorFetchOrchestrator,
} from "./fetchOrchestrator";
import {
	formatRemoteIndicators,
	formatRemoteMovingAverages,
	priceFromPayloads,
} from "./formatRemote";
import { DEFAULT_INDICATOR_SPECS, type IndicatorSpec } from "./indicatorSpecs";
import { RateLimiter } from "./rateLimiter";

export const QUOTE_CURRENCY = "USDT";

export interface RemoteFetchOptions {
	source: IndicatorSource;
	exchange?: string;
	interval?: string;
	rateLimitDelayMs?: number;
	maxRetries?: number;
	retryDelayMs?: number;
	/** Spot price provider; without one the price comes from indicator payloads. */
	priceSource?: PriceSource;
	registry?: CryptoRegistry;
	specs?: readonly IndicatorSpec[];
	/** Shared throttle when several symbols run against the same quota. */
	rateLimiter?: RateLimiter;
	clock?: Clock;
	now?: WallClock;
	logger?: ModuleLogger;
}

interface ResolvedPrice {
	price: number;
	priceChange: number;
	priceChangePercent: number;
	available: boolean;
}

const resolvePrice = async (
	symbol: string,
	payloads: ReadonlyMap<string, IndicatorPayload>,
	priceSource: PriceSource | undefined,
	logger: ModuleLogger
): Promise<ResolvedPrice> => {
	if (priceSource) {
		try {
			const snapshot = await priceSource.getPrice(symbol);
			return {
				price: snapshot.price,
				priceChange: snapshot.change24h,
				priceChangePercent: snapshot.changePercent24h,
				available: true,
			};
		} catch (error) {
			logger.warn("price_fetch_failed", {
				symbol,
				error: describeError(error),
			});
		}
	}

	const close = priceFromPayloads(payloads);
	if (close === null) {
		return { price: 0, priceChange: 0, priceChangePercent: 0, available: false };
	}
	return { price: close, priceChange: 0, priceChangePercent: 0, available: true };
};

/**
 * Remote acquisition path. Fetches every indicator one request at a time,
 * retries what failed, and assembles whatever arrived. Fetch failures never
 * throw: they show up as omissions plus `metadata.errors` and
 * `metadata.successRatio`.
 *
 * @throws UnsupportedSymbolError before any request when the symbol is unknown
 */
export const fetchFromRemote = async (
	symbol: string,
	options: RemoteFetchOptions
): Promise<TechnicalAnalysisRecord> => {
	const registry = options.registry ?? loadCryptoRegistry();
	const crypto = registry.require(symbol);
	const logger = options.logger ?? silentLogger;
	const clock = options.clock ?? systemClock;
	const exchange = (options.exchange ?? "binance").toLowerCase();
	const interval = options.interval ?? "1h";

	const rateLimiter =
		options.rateLimiter ??
		new RateLimiter({
			delayMs: options.rateLimitDelayMs ?? 18_000,
			clock,
			logger,
		});
	const orchestrator = new IndicatorFetchOrchestrator({
		source: options.source,
		rateLimiter,
		target: {
			symbolPair: `${crypto.symbol}/${QUOTE_CURRENCY}`,
			exchange,
			interval,
		},
		maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
		retryDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
		clock,
		logger,
	});

	const result = await orchestrator.fetchAll(
		options.specs ?? DEFAULT_INDICATOR_SPECS
	);

	const payloads = new Map<string, IndicatorPayload>();
	for (const [key, outcome] of result.values) {
		if (outcome.ok) {
			payloads.set(key, outcome.value);
		}
	}

	const price = await resolvePrice(
		crypto.symbol,
		payloads,
		options.priceSource,
		logger
	);
	const knownPrice = price.available ? price.price : null;

	if (result.fetched === 0) {
		logger.error("remote_fetch_empty", {
			symbol: crypto.symbol,
			requested: result.requested,
		});
	}

	const metadata: RemoteRecordMetadata = {
		provider: "taapi",
		exchange,
		interval,
		summaryPolicy: "union-vote",
		fetched: result.fetched,
		requested: result.requested,
		successRatio: result.successRatio,
		errors: result.errors,
		priceAvailable: price.available,
	};

	return assembleRecord(
		{
			symbol: crypto.symbol,
			price: price.price,
			priceChange: price.priceChange,
			priceChangePercent: price.priceChangePercent,
			technicalIndicators: formatRemoteIndicators(payloads, knownPrice),
			movingAverages: formatRemoteMovingAverages(payloads, knownPrice),
			pivotPoints: [],
			sourceUrl: `https://www.${exchange}.com/trade/${crypto.symbol}_${QUOTE_CURRENCY}`,
			metadata,
			summaryPolicy: UnionVotePolicy,
		},
		{ now: options.now, logger }
	);
};
