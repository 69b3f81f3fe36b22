import type {
	IndicatorResult,
	MovingAverageResult,
	PivotSet,
	RecordMetadata,
	SummaryLabel,
	TechnicalAnalysisRecord,
} from "@cryptota/core";

/**
 * Flat row shape of the `technical_analysis` table: one column per record
 * field, summaries split out so they can be filtered without parsing JSON.
 */
export interface StorageRow {
	symbol: string;
	price: number;
	price_change: number;
	price_change_percent: number;
	overall_summary: SummaryLabel;
	technical_summary: SummaryLabel;
	moving_averages_summary: SummaryLabel;
	technical_indicators: IndicatorResult[];
	moving_averages: MovingAverageResult[];
	pivot_points: PivotSet[];
	source_url: string;
	scraped_at: string;
	metadata: RecordMetadata;
}

const SUMMARY_LABELS: readonly SummaryLabel[] = [
	"Strong Buy",
	"Buy",
	"Neutral",
	"Sell",
	"Strong Sell",
];

export const toStorageRow = (record: TechnicalAnalysisRecord): StorageRow => ({
	symbol: record.symbol,
	price: record.price,
	price_change: record.priceChange,
	price_change_percent: record.priceChangePercent,
	overall_summary: record.summary.overall,
	technical_summary: record.summary.technicalIndicators,
	moving_averages_summary: record.summary.movingAverages,
	technical_indicators: record.technicalIndicators.map((entry) => ({ ...entry })),
	moving_averages: record.movingAverages.map((entry) => ({ ...entry })),
	pivot_points: record.pivotPoints.map((entry) => ({ ...entry })),
	source_url: record.sourceUrl,
	scraped_at: record.scrapedAt,
	metadata: { ...record.metadata },
});

export const fromStorageRow = (row: StorageRow): TechnicalAnalysisRecord => ({
	symbol: row.symbol,
	price: row.price,
	priceChange: row.price_change,
	priceChangePercent: row.price_change_percent,
	summary: {
		overall: row.overall_summary,
		technicalIndicators: row.technical_summary,
		movingAverages: row.moving_averages_summary,
	},
	technicalIndicators: row.technical_indicators,
	movingAverages: row.moving_averages,
	pivotPoints: row.pivot_points,
	sourceUrl: row.source_url,
	scrapedAt: row.scraped_at,
	metadata: row.metadata,
});

const isObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isSummaryLabel = (value: unknown): value is SummaryLabel =>
	SUMMARY_LABELS.some((label) => label === value);

const isArrayOfObjects = (value: unknown): boolean =>
	Array.isArray(value) && value.every(isObject);

/** Shape check for rows read back from storage. */
export const isStorageRow = (value: unknown): value is StorageRow => {
	if (!isObject(value)) {
		return false;
	}
	const metadata = value.metadata;
	return (
		typeof value.symbol === "string" &&
		typeof value.price === "number" &&
		typeof value.price_change === "number" &&
		typeof value.price_change_percent === "number" &&
		isSummaryLabel(value.overall_summary) &&
		isSummaryLabel(value.technical_summary) &&
		isSummaryLabel(value.moving_averages_summary) &&
		isArrayOfObjects(value.technical_indicators) &&
		isArrayOfObjects(value.moving_averages) &&
		isArrayOfObjects(value.pivot_points) &&
		typeof value.source_url === "string" &&
		typeof value.scraped_at === "string" &&
		isObject(metadata) &&
		(metadata.provider === "local" || metadata.provider === "taapi")
	);
};

/** Most recent first by `scrapedAt`; ties keep the later insert first. */
export const selectLatest = (
	records: readonly TechnicalAnalysisRecord[],
	symbol: string | undefined,
	limit: number
): TechnicalAnalysisRecord[] => {
	const wanted = symbol?.toUpperCase();
	return records
		.map((record, index) => ({ record, index }))
		.filter(({ record }) => wanted === undefined || record.symbol === wanted)
		.sort(
			(left, right) =>
				right.record.scrapedAt.localeCompare(left.record.scrapedAt) ||
				right.index - left.index
		)
		.slice(0, Math.max(0, limit))
		.map(({ record }) => record);
};
