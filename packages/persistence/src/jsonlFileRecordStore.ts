import fs from "node:fs/promises";
import path from "node:path";
import {
	PersistError,
	describeError,
	silentLogger,
	type ModuleLogger,
	type RecordStore,
	type TechnicalAnalysisRecord,
} from "@cryptota/core";
import { DEFAULT_LATEST_LIMIT } from "./memoryRecordStore";
import {
	fromStorageRow,
	isStorageRow,
	selectLatest,
	toStorageRow,
} from "./storageRow";

export interface JsonlFileRecordStoreOptions {
	filePath: string;
	logger?: ModuleLogger;
}

const isMissingFile = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Append-only JSON-lines store: one flat storage row per line. Lines that do
 * not parse as a row are logged and skipped on read.
 */
export class JsonlFileRecordStore implements RecordStore {
	readonly filePath: string;
	private readonly logger: ModuleLogger;

	constructor(options: JsonlFileRecordStoreOptions) {
		this.filePath = options.filePath;
		this.logger = options.logger ?? silentLogger;
	}

	async insert(record: TechnicalAnalysisRecord): Promise<boolean> {
		const line = `${JSON.stringify(toStorageRow(record))}\n`;
		try {
			await fs.mkdir(path.dirname(this.filePath), { recursive: true });
			await fs.appendFile(this.filePath, line, "utf-8");
		} catch (error) {
			throw new PersistError(record.symbol, describeError(error), {
				cause: error,
			});
		}
		this.logger.info("record_stored", {
			symbol: record.symbol,
			filePath: this.filePath,
		});
		return true;
	}

	async latest(
		symbol?: string,
		limit = DEFAULT_LATEST_LIMIT
	): Promise<TechnicalAnalysisRecord[]> {
		return selectLatest(await this.readAll(), symbol, limit);
	}

	private async readAll(): Promise<TechnicalAnalysisRecord[]> {
		let contents: string;
		try {
			contents = await fs.readFile(this.filePath, "utf-8");
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}
			throw error;
		}

		const records: TechnicalAnalysisRecord[] = [];
		contents.split("\n").forEach((line, index) => {
			if (!line.trim()) {
				return;
			}
			let parsed: unknown;
			try {
				parsed = JSON.parse(line);
			} catch (error) {
				this.logger.warn("store_row_skipped", {
					line: index + 1,
					reason: describeError(error),
				});
				return;
			}
			if (!isStorageRow(parsed)) {
				this.logger.warn("store_row_skipped", {
					line: index + 1,
					reason: "unexpected row shape",
				});
				return;
			}
			records.push(fromStorageRow(parsed));
		});
		return records;
	}
}
