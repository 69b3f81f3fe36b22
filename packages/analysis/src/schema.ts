import {
	INDICATOR_ORDER,
	MOVING_AVERAGE_PERIODS,
	silentLogger,
	systemWallClock,
	type IndicatorResult,
	type ModuleLogger,
	type MovingAverageResult,
	type PivotSet,
	type RecordMetadata,
	type TechnicalAnalysisRecord,
	type WallClock,
} from "@cryptota/core";
import { buildSummary, type SummaryPolicy } from "./summary";

export const MAX_INDICATORS = INDICATOR_ORDER.length;
export const MAX_MOVING_AVERAGES = MOVING_AVERAGE_PERIODS.length;

export interface RecordParts {
	symbol: string;
	price: number;
	priceChange: number;
	priceChangePercent: number;
	technicalIndicators: IndicatorResult[];
	movingAverages: MovingAverageResult[];
	pivotPoints: PivotSet[];
	sourceUrl: string;
	metadata: RecordMetadata;
	summaryPolicy: SummaryPolicy;
}

export interface AssembleOptions {
	now?: WallClock;
	logger?: ModuleLogger;
}

const finite = (...values: number[]): boolean =>
	values.every((value) => Number.isFinite(value));

/** True when every number the entry's kind carries is finite. */
export const hasFiniteValues = (indicator: IndicatorResult): boolean => {
	switch (indicator.kind) {
		case "scalar":
			return finite(indicator.value);
		case "band":
			return finite(indicator.upper, indicator.middle, indicator.lower);
		case "macd":
			return finite(indicator.value, indicator.signalLine, indicator.histogram);
		case "trend":
			return indicator.value === "N/A" || finite(indicator.value);
	}
};

/**
 * Canonical order, one entry per name, no entries with non-finite values.
 */
export const canonicalizeIndicators = (
	indicators: readonly IndicatorResult[]
): IndicatorResult[] => {
	const byName = new Map<string, IndicatorResult>();
	for (const indicator of indicators) {
		if (!byName.has(indicator.name) && hasFiniteValues(indicator)) {
			byName.set(indicator.name, indicator);
		}
	}
	return INDICATOR_ORDER.flatMap((name) => {
		const entry = byName.get(name);
		return entry ? [entry] : [];
	});
};

export const canonicalizeMovingAverages = (
	averages: readonly MovingAverageResult[]
): MovingAverageResult[] =>
	MOVING_AVERAGE_PERIODS.flatMap((period) => {
		const entry = averages.find(
			(average) => average.period === period && Number.isFinite(average.value)
		);
		return entry ? [entry] : [];
	});

/** Resistances ascend away from the pivot, supports descend. */
export const isOrderedPivotSet = (set: PivotSet): boolean =>
	finite(set.pivot, set.r1, set.r2, set.r3, set.s1, set.s2, set.s3) &&
	set.r1 <= set.r2 &&
	set.r2 <= set.r3 &&
	set.s1 >= set.s2 &&
	set.s2 >= set.s3;

/** Own copy of the metadata, so freezing never reaches the caller's errors list. */
const copyMetadata = (metadata: RecordMetadata): RecordMetadata =>
	metadata.provider === "taapi"
		? { ...metadata, errors: metadata.errors.map((entry) => ({ ...entry })) }
		: { ...metadata };

const deepFreeze = <T>(value: T): T => {
	if (value && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const nested of Object.values(value)) {
			deepFreeze(nested);
		}
	}
	return value;
};

/**
 * Builds the immutable record handed to storage. Summaries are derived here,
 * from the canonical lists, with the policy of the acquisition path. Entries
 * are copied before freezing; the caller's objects stay mutable.
 */
export const assembleRecord = (
	parts: RecordParts,
	options: AssembleOptions = {}
): TechnicalAnalysisRecord => {
	const logger = options.logger ?? silentLogger;
	const now = options.now ?? systemWallClock;

	const technicalIndicators = canonicalizeIndicators(parts.technicalIndicators);
	const movingAverages = canonicalizeMovingAverages(parts.movingAverages);
	const pivotPoints = parts.pivotPoints.filter((set) => {
		const ordered = isOrderedPivotSet(set);
		if (!ordered) {
			logger.warn("pivot_set_dropped", {
				symbol: parts.symbol,
				type: set.type,
			});
		}
		return ordered;
	});

	const dropped =
		parts.technicalIndicators.length - technicalIndicators.length;
	if (dropped > 0) {
		logger.warn("indicators_dropped", { symbol: parts.symbol, dropped });
	}

	const record: TechnicalAnalysisRecord = {
		symbol: parts.symbol,
		price: parts.price,
		priceChange: parts.priceChange,
		priceChangePercent: parts.priceChangePercent,
		summary: buildSummary(
			technicalIndicators,
			movingAverages,
			parts.summaryPolicy
		),
		technicalIndicators: technicalIndicators.map((entry) => ({ ...entry })),
		movingAverages: movingAverages.map((entry) => ({ ...entry })),
		pivotPoints: pivotPoints.map((set) => ({ ...set })),
		sourceUrl: parts.sourceUrl,
		scrapedAt: now().toISOString(),
		metadata: copyMetadata(parts.metadata),
	};

	logger.info("record_assembled", {
		symbol: record.symbol,
		price: record.price,
		overall: record.summary.overall,
		indicators: technicalIndicators.length,
		movingAverages: movingAverages.length,
		provider: record.metadata.provider,
	});

	return deepFreeze(record);
};

export const serializeRecord = (
	record: TechnicalAnalysisRecord,
	space?: number
): string => JSON.stringify(record, null, space);
