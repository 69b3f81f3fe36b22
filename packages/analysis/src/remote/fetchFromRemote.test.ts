import { describe, expect, it, vi } from "vitest";
import {
	CryptoRegistry,
	UnsupportedSymbolError,
	type IndicatorPayload,
	type IndicatorSource,
	type PriceSource,
} from "@cryptota/core";
import { createFakeClock, fixedWallClock } from "../__tests__/fakeClock";
import { fetchFromRemote, type RemoteFetchOptions } from "./fetchFromRemote";

const registry = new CryptoRegistry([
	{ symbol: "BTC", name: "Bitcoin", coingeckoId: "bitcoin", slug: "bitcoin" },
	{ symbol: "ETH", name: "Ethereum", coingeckoId: "ethereum", slug: "ethereum" },
]);

const payloadFor = (indicator: string): IndicatorPayload => {
	switch (indicator) {
		case "rsi":
			return { value: 42, close: 97 };
		case "macd":
			return { valueMACD: 1, valueMACDSignal: 0.5, valueMACDHist: 0.5 };
		case "bbands":
			return { valueUpperBand: 110, valueMiddleBand: 100, valueLowerBand: 90 };
		case "stochrsi":
			return { valueFastK: 40, valueFastD: 35 };
		case "supertrend":
			return { value: 95, valueAdvice: "long" };
		default:
			return { value: 42 };
	}
};

const workingSource = (): IndicatorSource => ({
	fetch: vi.fn(async (indicator: string) => payloadFor(indicator)),
});

const failingSource = (): IndicatorSource => ({
	fetch: vi.fn(async (): Promise<IndicatorPayload> => {
		throw new Error("connect ECONNREFUSED");
	}),
});

const priceSource = (price: number): PriceSource => ({
	getPrice: vi.fn(async () => ({
		price,
		change24h: 2,
		changePercent24h: 2.04,
		marketCap: 1_000_000,
		volume24h: 50_000,
		asOf: 1_714_521_600_000,
	})),
	getOhlc: vi.fn(async () => []),
});

const baseOptions = (source: IndicatorSource): RemoteFetchOptions => ({
	source,
	registry,
	exchange: "Binance",
	interval: "1h",
	rateLimitDelayMs: 0,
	maxRetries: 0,
	retryDelayMs: 0,
	clock: createFakeClock(),
	now: fixedWallClock(),
});

describe("fetchFromRemote", () => {
	it("rejects unsupported symbols before any request", async () => {
		const source = workingSource();

		await expect(fetchFromRemote("NOPE", baseOptions(source))).rejects.toThrow(
			UnsupportedSymbolError
		);
		expect(source.fetch).not.toHaveBeenCalled();
	});

	it("assembles a full record with the union-vote summary", async () => {
		const source = workingSource();
		const record = await fetchFromRemote("btc", {
			...baseOptions(source),
			priceSource: priceSource(100),
		});

		expect(source.fetch).toHaveBeenCalledWith(
			"ema",
			"BTC/USDT",
			"binance",
			"1h",
			{ period: 200 }
		);
		expect(record.symbol).toBe("BTC");
		expect(record.price).toBe(100);
		expect(record.priceChange).toBe(2);
		expect(record.priceChangePercent).toBe(2.04);
		expect(record.sourceUrl).toBe("https://www.binance.com/trade/BTC_USDT");
		expect(record.pivotPoints).toEqual([]);
		expect(record.technicalIndicators).toHaveLength(9);
		expect(record.technicalIndicators[7]).toEqual({
			kind: "trend",
			name: "SuperTrend",
			value: 95,
			signal: "Buy",
			trend: "Uptrend",
		});
		expect(record.movingAverages.map((average) => average.signal)).toEqual([
			"Buy",
			"Buy",
			"Buy",
		]);
		expect(record.summary).toEqual({
			overall: "Buy",
			technicalIndicators: "Buy",
			movingAverages: "Strong Buy",
		});
		expect(record.metadata).toEqual({
			provider: "taapi",
			exchange: "binance",
			interval: "1h",
			summaryPolicy: "union-vote",
			fetched: 12,
			requested: 12,
			successRatio: 1,
			errors: [],
			priceAvailable: true,
		});
	});

	it("votes the union over Buy/Sell/Neutral labels only", async () => {
		const payloads: Record<string, IndicatorPayload> = {
			rsi: { value: 50 },
			macd: { valueMACD: -1, valueMACDSignal: 0.5 },
			bbands: { valueUpperBand: 110, valueMiddleBand: 100, valueLowerBand: 90 },
			obv: { value: 5_000 },
			stochrsi: { valueK: 50 },
			atr: { value: 3 },
			vwap: { value: 95, close: 100 },
			supertrend: { value: 92, trend: 1 },
			cmf: { value: 0.2 },
			ema: { value: 90 },
		};
		const source: IndicatorSource = {
			fetch: vi.fn(async (indicator: string) => payloads[indicator]),
		};

		const record = await fetchFromRemote("BTC", {
			...baseOptions(source),
			priceSource: priceSource(100),
		});

		const signals = [
			...record.technicalIndicators.map((indicator) => indicator.signal),
			...record.movingAverages.map((average) => average.signal),
		];
		expect(signals).toHaveLength(12);
		for (const signal of signals) {
			expect(["Buy", "Sell", "Neutral"]).toContain(signal);
		}
		expect(
			record.technicalIndicators.map((indicator) => [indicator.name, indicator.signal])
		).toEqual([
			["RSI(14)", "Neutral"],
			["MACD(12,26)", "Sell"],
			["Bollinger Bands(20,2)", "Neutral"],
			["OBV", "Buy"],
			["StochRSI", "Neutral"],
			["ATR(14)", "Neutral"],
			["VWAP", "Buy"],
			["SuperTrend", "Buy"],
			["CMF(20)", "Buy"],
		]);
		// 4 of 9 indicators buy; 7 of 12 across the union.
		expect(record.summary).toEqual({
			overall: "Buy",
			technicalIndicators: "Neutral",
			movingAverages: "Strong Buy",
		});
	});

	it("falls back to the candle close reported with RSI", async () => {
		const record = await fetchFromRemote("ETH", baseOptions(workingSource()));

		expect(record.price).toBe(97);
		expect(record.priceChange).toBe(0);
		expect(record.metadata).toMatchObject({ priceAvailable: true });
	});

	it("returns an explained empty record when every request fails", async () => {
		const record = await fetchFromRemote("BTC", baseOptions(failingSource()));

		expect(record.technicalIndicators).toEqual([]);
		expect(record.movingAverages).toEqual([]);
		expect(record.price).toBe(0);
		expect(record.summary.overall).toBe("Neutral");
		expect(record.metadata).toMatchObject({
			fetched: 0,
			requested: 12,
			successRatio: 0,
			priceAvailable: false,
		});
		if (record.metadata.provider === "taapi") {
			expect(record.metadata.errors).toHaveLength(12);
			expect(record.metadata.errors[0]).toEqual({
				key: "rsi",
				message: "Failed to fetch rsi: connect ECONNREFUSED",
				attempts: 1,
			});
		}
	});

	it("marks moving-average signals N/A without a price", async () => {
		const source: IndicatorSource = {
			fetch: vi.fn(async (indicator: string): Promise<IndicatorPayload> => {
				if (indicator !== "ema") {
					throw new Error("quota exceeded");
				}
				return { value: 50 };
			}),
		};

		const record = await fetchFromRemote("BTC", baseOptions(source));

		expect(record.movingAverages.map((average) => average.signal)).toEqual([
			"N/A",
			"N/A",
			"N/A",
		]);
		expect(record.summary.movingAverages).toBe("Neutral");
	});
});
