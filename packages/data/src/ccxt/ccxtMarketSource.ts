import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import {
	DAY_MS,
	HOUR_MS,
	MINUTE_MS,
	OHLC_DAYS,
	loadCryptoRegistry,
	type Candle,
	type CryptoRegistry,
	type OhlcDays,
	type PriceSnapshot,
	type PriceSource,
} from "@cryptota/core";
import { isOhlcDays } from "../coingecko/coinGeckoClient";
import { mapCcxtRowToCandle } from "./ccxtMapper";

export type MarketClient = Pick<Exchange, "fetchOHLCV" | "fetchTicker">;

const EXCHANGES: Record<string, () => MarketClient> = {
	binance: () =>
		new ccxt.binance({ enableRateLimit: true, options: { defaultType: "spot" } }),
	bybit: () => new ccxt.bybit({ enableRateLimit: true }),
	kraken: () => new ccxt.kraken({ enableRateLimit: true }),
	okx: () => new ccxt.okx({ enableRateLimit: true }),
};

export const supportedExchanges = (): string[] => Object.keys(EXCHANGES);

/** Public market-data client for a named exchange; no credentials needed. */
export const createMarketClient = (exchangeId: string): MarketClient => {
	const factory = EXCHANGES[exchangeId.toLowerCase()];
	if (!factory) {
		throw new Error(
			`Unsupported exchange ${exchangeId}. Expected one of: ${supportedExchanges().join(", ")}`
		);
	}
	return factory();
};

/**
 * Candle granularity matching what CoinGecko returns for the same window:
 * 30m up to 2 days, 4h up to 30 days, daily beyond.
 */
export const timeframeForDays = (
	days: OhlcDays
): { timeframe: string; stepMs: number } => {
	if (days <= 2) {
		return { timeframe: "30m", stepMs: 30 * MINUTE_MS };
	}
	if (days <= 30) {
		return { timeframe: "4h", stepMs: 4 * HOUR_MS };
	}
	return { timeframe: "1d", stepMs: DAY_MS };
};

export interface CcxtMarketSourceOptions {
	exchange?: string;
	client?: MarketClient;
	registry?: CryptoRegistry;
	quote?: string;
	now?: () => number;
}

/**
 * Price source backed by an exchange's public REST API. Candles carry real
 * traded volume, so the local compute path can skip the volume proxy.
 */
export class CcxtMarketSource implements PriceSource {
	private readonly client: MarketClient;
	private readonly registry: CryptoRegistry;
	private readonly quote: string;
	private readonly now: () => number;

	constructor(options: CcxtMarketSourceOptions = {}) {
		this.client = options.client ?? createMarketClient(options.exchange ?? "binance");
		this.registry = options.registry ?? loadCryptoRegistry();
		this.quote = options.quote ?? "USDT";
		this.now = options.now ?? Date.now;
	}

	private pairFor(symbol: string): string {
		return `${this.registry.require(symbol).symbol}/${this.quote}`;
	}

	async getPrice(symbol: string): Promise<PriceSnapshot> {
		const ticker = await this.client.fetchTicker(this.pairFor(symbol));
		const price = Number(ticker.last ?? ticker.close ?? 0);
		return {
			price,
			change24h: Number(ticker.change ?? 0),
			changePercent24h: Number(ticker.percentage ?? 0),
			// Exchanges do not report market capitalisation.
			marketCap: 0,
			volume24h: Number(ticker.quoteVolume ?? 0),
			asOf: Number(ticker.timestamp ?? this.now()),
		};
	}

	async getOhlc(symbol: string, days: OhlcDays): Promise<Candle[]> {
		if (!isOhlcDays(days)) {
			throw new RangeError(
				`Invalid days parameter ${String(days)}. Must be one of: ${OHLC_DAYS.join(", ")}`
			);
		}
		const pair = this.pairFor(symbol);
		const { timeframe, stepMs } = timeframeForDays(days);
		const since = this.now() - days * DAY_MS;
		const limit = Math.ceil((days * DAY_MS) / stepMs);

		const rows = await this.client.fetchOHLCV(pair, timeframe, since, limit);
		return rows
			.map(mapCcxtRowToCandle)
			.sort((left, right) => left.timestamp - right.timestamp);
	}
}
