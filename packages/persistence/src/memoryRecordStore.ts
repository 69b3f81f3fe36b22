import type { RecordStore, TechnicalAnalysisRecord } from "@cryptota/core";
import { selectLatest } from "./storageRow";

export const DEFAULT_LATEST_LIMIT = 10;

/** Process-local store, used for dry runs and tests. */
export class MemoryRecordStore implements RecordStore {
	private readonly records: TechnicalAnalysisRecord[] = [];

	async insert(record: TechnicalAnalysisRecord): Promise<boolean> {
		this.records.push(record);
		return true;
	}

	async latest(
		symbol?: string,
		limit = DEFAULT_LATEST_LIMIT
	): Promise<TechnicalAnalysisRecord[]> {
		return selectLatest(this.records, symbol, limit);
	}
}
