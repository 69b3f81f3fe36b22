import type { TechnicalAnalysisRecord } from "../types";

/**
 * Storage collaborator for assembled records. `insert` resolves to true only
 * when the record was persisted; it may also reject, and callers treat both
 * outcomes as non-fatal.
 */
export interface RecordStore {
	insert(record: TechnicalAnalysisRecord): Promise<boolean>;
	/** Most recent records first, optionally filtered by symbol. */
	latest(symbol?: string, limit?: number): Promise<TechnicalAnalysisRecord[]>;
}
