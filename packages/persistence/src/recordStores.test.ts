import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	PersistError,
	silentLogger,
	type TechnicalAnalysisRecord,
} from "@cryptota/core";
import { createRecordStore } from "./createRecordStore";
import { JsonlFileRecordStore } from "./jsonlFileRecordStore";
import { MemoryRecordStore } from "./memoryRecordStore";
import { toStorageRow } from "./storageRow";

const buildRecord = (
	symbol: string,
	scrapedAt: string,
	price = 100
): TechnicalAnalysisRecord => ({
	symbol,
	price,
	priceChange: 1.5,
	priceChangePercent: 1.52,
	summary: { overall: "Buy", technicalIndicators: "Neutral", movingAverages: "Strong Buy" },
	technicalIndicators: [{ kind: "scalar", name: "RSI(14)", value: 61.2, signal: "Neutral" }],
	movingAverages: [
		{ name: "MA20", period: 20, type: "Exponential", value: 98, signal: "Buy" },
	],
	pivotPoints: [
		{ type: "Classic", pivot: 100, r1: 102, r2: 104, r3: 106, s1: 98, s2: 96, s3: 94 },
	],
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

describe("toStorageRow", () => {
	it("flattens the summaries into their own columns", () => {
		const row = toStorageRow(buildRecord("BTC", "2024-05-01T12:00:00.000Z"));

		expect(row.overall_summary).toBe("Buy");
		expect(row.technical_summary).toBe("Neutral");
		expect(row.moving_averages_summary).toBe("Strong Buy");
		expect(row.price_change_percent).toBe(1.52);
		expect(row.scraped_at).toBe("2024-05-01T12:00:00.000Z");
		expect(row.technical_indicators).toHaveLength(1);
	});
});

describe("MemoryRecordStore", () => {
	it("returns the most recent records first, filtered by symbol", async () => {
		const store = new MemoryRecordStore();
		await store.insert(buildRecord("BTC", "2024-05-01T10:00:00.000Z", 1));
		await store.insert(buildRecord("ETH", "2024-05-01T11:00:00.000Z", 2));
		await store.insert(buildRecord("BTC", "2024-05-01T12:00:00.000Z", 3));

		const latest = await store.latest("btc");

		expect(latest.map((record) => record.price)).toEqual([3, 1]);
		expect((await store.latest(undefined, 1)).map((record) => record.price)).toEqual([3]);
		expect(await store.latest()).toHaveLength(3);
	});
});

describe("JsonlFileRecordStore", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "ta-store-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("appends one flat row per record and reads them back", async () => {
		const filePath = path.join(dir, "nested", "records.jsonl");
		const store = new JsonlFileRecordStore({ filePath });
		const first = buildRecord("BTC", "2024-05-01T10:00:00.000Z", 1);
		const second = buildRecord("BTC", "2024-05-01T12:00:00.000Z", 2);

		await expect(store.insert(first)).resolves.toBe(true);
		await store.insert(second);

		const lines = fs.readFileSync(filePath, "utf-8").trim().split("\n");
		expect(lines).toHaveLength(2);
		expect(JSON.parse(lines[0])).toEqual(toStorageRow(first));
		expect(await store.latest("BTC")).toEqual([second, first]);
	});

	it("returns nothing when the file does not exist yet", async () => {
		const store = new JsonlFileRecordStore({ filePath: path.join(dir, "missing.jsonl") });

		await expect(store.latest()).resolves.toEqual([]);
	});

	it("skips lines that are not storage rows", async () => {
		const filePath = path.join(dir, "records.jsonl");
		const record = buildRecord("ETH", "2024-05-01T10:00:00.000Z");
		fs.writeFileSync(
			filePath,
			`not json\n{"symbol":"ETH"}\n${JSON.stringify(toStorageRow(record))}\n`
		);
		const warn = vi.fn();
		const store = new JsonlFileRecordStore({
			filePath,
			logger: { ...silentLogger, warn },
		});

		expect(await store.latest()).toEqual([record]);
		expect(warn).toHaveBeenCalledTimes(2);
		expect(warn).toHaveBeenLastCalledWith("store_row_skipped", {
			line: 2,
			reason: "unexpected row shape",
		});
	});

	it("raises PersistError when the file cannot be written", async () => {
		const blocker = path.join(dir, "blocker");
		fs.writeFileSync(blocker, "");
		const store = new JsonlFileRecordStore({
			filePath: path.join(blocker, "records.jsonl"),
		});

		await expect(
			store.insert(buildRecord("BTC", "2024-05-01T10:00:00.000Z"))
		).rejects.toBeInstanceOf(PersistError);
	});
});

describe("createRecordStore", () => {
	it("builds the store for the configured driver", () => {
		expect(createRecordStore({ driver: "memory" })).toBeInstanceOf(MemoryRecordStore);
		const fileStore = createRecordStore({ driver: "file", filePath: "/tmp/records.jsonl" });
		expect(fileStore).toBeInstanceOf(JsonlFileRecordStore);
	});
});
