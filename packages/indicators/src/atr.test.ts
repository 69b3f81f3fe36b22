import { describe, expect, it } from "vitest";
import { averageTrueRange, averageTrueRangeSeries } from "./atr";

const flatCandles = (length: number, close: number, halfRange: number) =>
	Array.from({ length }, () => ({
		high: close + halfRange,
		low: close - halfRange,
		close,
	}));

describe("averageTrueRange", () => {
	it("averages a constant true range", () => {
		expect(averageTrueRange(flatCandles(20, 100, 1), 14)).toBe(2);
		expect(averageTrueRangeSeries(flatCandles(20, 100, 1), 14)).toHaveLength(6);
	});

	it("keeps the scale of sub-cent prices", () => {
		const candles = flatCandles(60, 0.00002, 0.0000002);

		const atr = averageTrueRange(candles, 14);

		expect(atr).not.toBeNull();
		expect(atr).toBeGreaterThan(0);
		expect(atr).toBeCloseTo(0.0000004, 12);
	});

	it("picks up gaps against the previous close", () => {
		const candles = [
			{ high: 11, low: 9, close: 10 },
			{ high: 21, low: 19, close: 20 },
		];
		expect(averageTrueRange(candles, 1)).toBe(11);
	});

	it("needs period + 1 candles", () => {
		expect(averageTrueRange(flatCandles(14, 100, 1), 14)).toBeNull();
	});
});
