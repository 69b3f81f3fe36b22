import {
	PersistError,
	describeError,
	silentLogger,
	systemClock,
	type Clock,
	type ModuleLogger,
	type RecordStore,
	type SummaryLabel,
	type TechnicalAnalysisRecord,
} from "@cryptota/core";

export type BatchStatus = "stored" | "dry-run" | "not-stored" | "failed";

export interface BatchOutcome {
	symbol: string;
	status: BatchStatus;
	overall?: SummaryLabel;
	successRatio?: number;
	error?: string;
}

export interface BatchResult {
	outcomes: BatchOutcome[];
	/** Symbols that produced a record, stored or not. */
	computed: number;
	failed: number;
	/** Non-zero only when some symbol produced no record at all. */
	exitCode: 0 | 1;
}

export interface BatchOptions {
	acquire: (symbol: string) => Promise<TechnicalAnalysisRecord>;
	store?: RecordStore;
	/** Pause between symbols, not after the last one. */
	cooldownMs?: number;
	dryRun?: boolean;
	clock?: Clock;
	logger?: ModuleLogger;
}

const storeRecord = async (
	store: RecordStore,
	record: TechnicalAnalysisRecord
): Promise<boolean> => {
	try {
		return await store.insert(record);
	} catch (error) {
		if (error instanceof PersistError) {
			throw error;
		}
		throw new PersistError(record.symbol, describeError(error), {
			cause: error,
		});
	}
};

const successRatioOf = (
	record: TechnicalAnalysisRecord
): number | undefined =>
	record.metadata.provider === "taapi"
		? record.metadata.successRatio
		: undefined;

/**
 * Runs one symbol fully after another with a fixed cooldown in between.
 * Acquisition failures mark the symbol failed; storage failures are logged
 * and leave the symbol counted as computed.
 */
export const runBatch = async (
	symbols: readonly string[],
	options: BatchOptions
): Promise<BatchResult> => {
	const clock = options.clock ?? systemClock;
	const logger = options.logger ?? silentLogger;
	const cooldownMs = options.cooldownMs ?? 5_000;
	const outcomes: BatchOutcome[] = [];

	for (const [index, symbol] of symbols.entries()) {
		if (index > 0 && cooldownMs > 0) {
			logger.debug("symbol_cooldown", { symbol, cooldownMs });
			await clock.sleep(cooldownMs);
		}

		let record: TechnicalAnalysisRecord;
		try {
			record = await options.acquire(symbol);
		} catch (error) {
			logger.error("symbol_failed", { symbol, error: describeError(error) });
			outcomes.push({ symbol, status: "failed", error: describeError(error) });
			continue;
		}

		const base = {
			symbol: record.symbol,
			overall: record.summary.overall,
			successRatio: successRatioOf(record),
		};

		if (options.dryRun || !options.store) {
			outcomes.push({ ...base, status: "dry-run" });
			continue;
		}

		try {
			const stored = await storeRecord(options.store, record);
			if (!stored) {
				logger.warn("record_not_stored", { symbol: record.symbol });
			}
			outcomes.push({ ...base, status: stored ? "stored" : "not-stored" });
		} catch (error) {
			logger.error("record_persist_failed", {
				symbol: record.symbol,
				error: describeError(error),
			});
			outcomes.push({
				...base,
				status: "not-stored",
				error: describeError(error),
			});
		}
	}

	const failed = outcomes.filter((outcome) => outcome.status === "failed").length;
	const result: BatchResult = {
		outcomes,
		computed: outcomes.length - failed,
		failed,
		exitCode: failed > 0 ? 1 : 0,
	};
	logger.info("batch_complete", {
		computed: result.computed,
		failed,
		outcomes,
	});
	return result;
};
