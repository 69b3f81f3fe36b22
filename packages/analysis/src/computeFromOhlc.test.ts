import { describe, expect, it } from "vitest";
import {
	InsufficientDataError,
	type Candle,
	type IndicatorResult,
	type OhlcRow,
} from "@cryptota/core";
import { fixedWallClock } from "./__tests__/fakeClock";
import { computeFromOhlc } from "./computeFromOhlc";
import { serializeRecord } from "./schema";

const HOUR = 3_600_000;
const START = 1_714_521_600_000;

const waveSeries = (count: number): Candle[] =>
	Array.from({ length: count }, (_, index) => {
		const close = 100 + 10 * Math.sin(index / 5) + index * 0.5;
		return {
			timestamp: START + index * HOUR,
			open: close - 0.5,
			high: close + 2,
			low: close - 2,
			close,
		};
	});

const flatSeries = (count: number, price = 100): Candle[] =>
	Array.from({ length: count }, (_, index) => ({
		timestamp: START + index * HOUR,
		open: price,
		high: price,
		low: price,
		close: price,
	}));

const findIndicator = (
	indicators: readonly IndicatorResult[],
	name: IndicatorResult["name"]
): IndicatorResult | undefined =>
	indicators.find((indicator) => indicator.name === name);

describe("computeFromOhlc", () => {
	it("rejects fewer than 50 candles", () => {
		expect(() => computeFromOhlc("BTC", waveSeries(49))).toThrow(
			InsufficientDataError
		);
		expect(() => computeFromOhlc("BTC", waveSeries(10))).toThrow(
			"Insufficient data: need at least 50 candles, got 10"
		);
	});

	it("reads a flat market as neutral", () => {
		const record = computeFromOhlc("btc", flatSeries(60), {
			now: fixedWallClock(),
		});

		expect(record.symbol).toBe("BTC");
		expect(record.price).toBe(100);
		expect(record.priceChange).toBe(0);
		expect(record.priceChangePercent).toBe(0);
		expect(findIndicator(record.technicalIndicators, "RSI(14)")).toEqual({
			kind: "scalar",
			name: "RSI(14)",
			value: 50,
			signal: "Neutral",
		});
		expect(
			findIndicator(record.technicalIndicators, "Bollinger Bands(20,2)")
		).toEqual({
			kind: "band",
			name: "Bollinger Bands(20,2)",
			upper: 100,
			middle: 100,
			lower: 100,
			signal: "Neutral",
		});
		expect(record.movingAverages.map((average) => average.value)).toEqual([
			100, 100, 100,
		]);
		expect(record.summary).toEqual({
			overall: "Neutral",
			technicalIndicators: "Neutral",
			movingAverages: "Neutral",
		});
	});

	it("omits indicators with no defined value and marks SuperTrend N/A", () => {
		const record = computeFromOhlc("BTC", flatSeries(60));

		// Zero range means zero synthetic volume, and a flat RSI has no stochastic position.
		expect(record.technicalIndicators.map((indicator) => indicator.name)).toEqual([
			"RSI(14)",
			"MACD(12,26)",
			"Bollinger Bands(20,2)",
			"OBV",
			"ATR(14)",
			"SuperTrend",
		]);
		expect(findIndicator(record.technicalIndicators, "SuperTrend")).toEqual({
			kind: "trend",
			name: "SuperTrend",
			value: "N/A",
			signal: "N/A",
			trend: "N/A",
		});
	});

	it("is deterministic for identical input", () => {
		const candles = waveSeries(120);
		const first = computeFromOhlc("ETH", candles, { now: fixedWallClock() });
		const second = computeFromOhlc("ETH", candles, { now: fixedWallClock() });

		expect(serializeRecord(first)).toBe(serializeRecord(second));
	});

	it("keeps oscillators in range and respects the caps", () => {
		const record = computeFromOhlc("ETH", waveSeries(250));

		expect(record.technicalIndicators).toHaveLength(9);
		expect(record.movingAverages).toHaveLength(3);
		for (const name of ["RSI(14)", "StochRSI"] as const) {
			const indicator = findIndicator(record.technicalIndicators, name);
			expect(indicator?.kind).toBe("scalar");
			if (indicator?.kind === "scalar") {
				expect(indicator.value).toBeGreaterThanOrEqual(0);
				expect(indicator.value).toBeLessThanOrEqual(100);
			}
		}
	});

	it("accepts unsorted raw OHLC rows", () => {
		const candles = waveSeries(80);
		const rows: OhlcRow[] = candles
			.map((candle): OhlcRow => [
				candle.timestamp,
				candle.open,
				candle.high,
				candle.low,
				candle.close,
			])
			.reverse();

		const fromRows = computeFromOhlc("SOL", rows, { now: fixedWallClock() });
		const fromCandles = computeFromOhlc("SOL", candles, {
			now: fixedWallClock(),
		});

		expect(fromRows).toEqual(fromCandles);
	});

	it("derives price change and classic pivots from the previous candle", () => {
		const candles = flatSeries(60);
		candles[58] = { ...candles[58], high: 110, low: 90, close: 100 };
		candles[59] = { ...candles[59], high: 106, low: 100, close: 105 };

		const record = computeFromOhlc("BTC", candles);

		expect(record.price).toBe(105);
		expect(record.priceChange).toBe(5);
		expect(record.priceChangePercent).toBe(5);
		expect(record.pivotPoints).toEqual([
			{
				type: "Classic",
				pivot: 100,
				r1: 110,
				r2: 120,
				r3: 130,
				s1: 90,
				s2: 80,
				s3: 70,
			},
		]);
	});

	it("flags synthetic volume and uses reported volume when every candle has it", () => {
		const synthetic = computeFromOhlc("BTC", waveSeries(60));
		expect(synthetic.metadata).toEqual({
			provider: "local",
			dataPoints: 60,
			volumeSource: "synthetic",
			volumeProxyFactor: 1000,
			summaryPolicy: "agreement",
		});

		const reported = computeFromOhlc(
			"BTC",
			waveSeries(60).map((candle) => ({ ...candle, volume: 25 }))
		);
		expect(reported.metadata).toMatchObject({
			volumeSource: "reported",
			volumeProxyFactor: null,
		});
	});

	it("builds the CoinGecko source URL", () => {
		expect(computeFromOhlc("MATIC", flatSeries(50)).sourceUrl).toBe(
			"https://www.coingecko.com/en/coins/matic"
		);
		expect(
			computeFromOhlc("MATIC", flatSeries(50), {
				coingeckoId: "matic-network",
			}).sourceUrl
		).toBe("https://www.coingecko.com/en/coins/matic-network");
	});
});
