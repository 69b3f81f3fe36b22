import { describe, expect, it } from "vitest";
import type { RecordStore, TechnicalAnalysisRecord } from "@cryptota/core";
import { MemoryRecordStore } from "@cryptota/persistence";
import {
	checkFreshness,
	classifyAge,
	formatFreshness,
	isHealthy,
} from "./freshness";

const MINUTE = 60_000;
const NOW = () => new Date("2024-05-01T12:00:00.000Z");

const buildRecord = (
	symbol: string,
	scrapedAt: string,
	price = 62000.5
): TechnicalAnalysisRecord => ({
	symbol,
	price,
	priceChange: 10,
	priceChangePercent: 0.02,
	summary: { overall: "Buy", technicalIndicators: "Neutral", movingAverages: "Strong Buy" },
	technicalIndicators: [
		{ kind: "scalar", name: "RSI(14)", value: 61.2, signal: "Neutral" },
		{ kind: "scalar", name: "CMF(20)", value: 0.12, signal: "Buy" },
	],
	movingAverages: [],
	pivotPoints: [],
	sourceUrl: "https://www.coingecko.com/en/coins/bitcoin",
	scrapedAt,
	metadata: {
		provider: "local",
		dataPoints: 60,
		volumeSource: "synthetic",
		volumeProxyFactor: 1000,
		summaryPolicy: "agreement",
	},
});

describe("classifyAge", () => {
	it("splits at one and two hours", () => {
		expect(classifyAge(59 * MINUTE)).toBe("fresh");
		expect(classifyAge(60 * MINUTE)).toBe("acceptable");
		expect(classifyAge(119 * MINUTE)).toBe("acceptable");
		expect(classifyAge(120 * MINUTE)).toBe("stale");
	});
});

describe("checkFreshness", () => {
	it("reports the newest record for the symbol", async () => {
		const store = new MemoryRecordStore();
		await store.insert(buildRecord("BTC", "2024-05-01T08:00:00.000Z", 1));
		await store.insert(buildRecord("BTC", "2024-05-01T11:30:00.000Z"));

		const report = await checkFreshness(store, "BTC", NOW);

		expect(report).toEqual({
			symbol: "BTC",
			status: "fresh",
			ageMinutes: 30,
			ageHours: 0.5,
			scrapedAt: "2024-05-01T11:30:00.000Z",
			price: 62000.5,
			indicatorCount: 2,
			overallSummary: "Buy",
		});
		expect(isHealthy(report)).toBe(true);
	});

	it("flags a symbol with no stored records", async () => {
		const report = await checkFreshness(new MemoryRecordStore(), "ETH", NOW);

		expect(report).toEqual({ symbol: "ETH", status: "no_data" });
		expect(isHealthy(report)).toBe(false);
	});

	it("turns a store failure into an error report", async () => {
		const store: RecordStore = {
			insert: async () => true,
			latest: async () => {
				throw new Error("store offline");
			},
		};

		await expect(checkFreshness(store, "BTC", NOW)).resolves.toEqual({
			symbol: "BTC",
			status: "error",
			error: "store offline",
		});
	});
});

describe("formatFreshness", () => {
	it("prints age in minutes under an hour", async () => {
		const store = new MemoryRecordStore();
		await store.insert(buildRecord("BTC", "2024-05-01T11:30:00.000Z"));

		const text = formatFreshness(await checkFreshness(store, "BTC", NOW));

		expect(text.split("\n")).toEqual([
			"BTC: fresh",
			"  Age: 30.0 minutes",
			"  Scraped: 2024-05-01 11:30:00 UTC",
			"  Price: $62,000.50",
			"  Indicators: 2",
			"  Summary: Buy",
		]);
	});

	it("prints age in hours once stale", async () => {
		const store = new MemoryRecordStore();
		await store.insert(buildRecord("SOL", "2024-05-01T09:00:00.000Z", 150));

		const report = await checkFreshness(store, "SOL", NOW);

		expect(report.status).toBe("stale");
		expect(formatFreshness(report).split("\n")[1]).toBe("  Age: 3.0 hours");
	});

	it("prints one line for missing data", () => {
		expect(formatFreshness({ symbol: "ETH", status: "no_data" })).toBe(
			"ETH: no_data (no stored records)"
		);
	});
});
