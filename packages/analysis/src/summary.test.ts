import { describe, expect, it } from "vitest";
import type { IndicatorResult, MovingAverageResult } from "@cryptota/core";
import {
	AgreementPolicy,
	UnionVotePolicy,
	buildSummary,
	labelFromTally,
	summarizeSignals,
	tallySignals,
} from "./summary";

const scalar = (
	name: IndicatorResult["name"],
	signal: IndicatorResult["signal"]
): IndicatorResult => ({ kind: "scalar", name, value: 1, signal });

const average = (
	period: MovingAverageResult["period"],
	signal: MovingAverageResult["signal"]
): MovingAverageResult => ({
	name: `MA${period}`,
	period,
	type: "Exponential",
	value: 100,
	signal,
});

describe("summarizeSignals", () => {
	it("labels an all-buy set Strong Buy", () => {
		expect(summarizeSignals(["Buy", "Oversold", "Bullish"])).toBe("Strong Buy");
	});

	it("labels an empty set Neutral", () => {
		expect(summarizeSignals([])).toBe("Neutral");
	});

	it("applies the majority and strong thresholds", () => {
		expect(summarizeSignals(["Buy", "Sell"])).toBe("Buy");
		expect(summarizeSignals(["Buy", "Neutral", "Neutral"])).toBe("Neutral");
		expect(summarizeSignals(["Sell", "Sell", "Neutral"])).toBe("Sell");
		expect(
			summarizeSignals(["Overbought", "Distribution", "Bearish", "Neutral"])
		).toBe("Strong Sell");
	});

	it("folds rich labels into buy and sell votes", () => {
		expect(
			tallySignals([
				"Accumulation",
				"Buying Pressure",
				"Selling Pressure",
				"High Volatility",
				"N/A",
			])
		).toEqual({ buy: 2, sell: 1, total: 5 });
	});

	it("checks buy thresholds before sell thresholds", () => {
		expect(labelFromTally({ buy: 1, sell: 1, total: 2 })).toBe("Buy");
	});
});

describe("summary policies", () => {
	const indicators = [
		scalar("RSI(14)", "Oversold"),
		scalar("OBV", "Accumulation"),
		scalar("ATR(14)", "Low Volatility"),
	];

	it("re-votes over the union of both sets", () => {
		const summary = buildSummary(
			indicators,
			[average(20, "Sell"), average(50, "Sell"), average(200, "Sell")],
			UnionVotePolicy
		);
		// 2 buy, 3 sell, 1 neutral out of 6
		expect(summary).toEqual({
			overall: "Sell",
			technicalIndicators: "Buy",
			movingAverages: "Strong Sell",
		});
	});

	it("requires both sub-summaries to agree under the agreement policy", () => {
		const disagreeing = buildSummary(
			indicators,
			[average(20, "Sell"), average(50, "Sell"), average(200, "Sell")],
			AgreementPolicy
		);
		expect(disagreeing.overall).toBe("Neutral");

		const agreeing = buildSummary(
			indicators,
			[average(20, "Buy"), average(50, "Buy"), average(200, "Sell")],
			AgreementPolicy
		);
		expect(agreeing).toEqual({
			overall: "Buy",
			technicalIndicators: "Buy",
			movingAverages: "Buy",
		});
	});

	it("reports Sell when both sides are bearish", () => {
		const summary = buildSummary(
			[scalar("RSI(14)", "Overbought")],
			[average(20, "Sell")],
			AgreementPolicy
		);
		expect(summary).toEqual({
			overall: "Sell",
			technicalIndicators: "Strong Sell",
			movingAverages: "Strong Sell",
		});
	});
});
