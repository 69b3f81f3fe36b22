import {
	HOUR_MS,
	MINUTE_MS,
	describeError,
	type RecordStore,
	type SummaryLabel,
	type WallClock,
} from "@cryptota/core";

export type FreshnessStatus =
	| "fresh"
	| "acceptable"
	| "stale"
	| "no_data"
	| "error";

export interface FreshnessReport {
	symbol: string;
	status: FreshnessStatus;
	ageMinutes?: number;
	ageHours?: number;
	scrapedAt?: string;
	price?: number;
	indicatorCount?: number;
	overallSummary?: SummaryLabel;
	error?: string;
}

export const FRESH_WITHIN_MS = HOUR_MS;
export const ACCEPTABLE_WITHIN_MS = 2 * HOUR_MS;

export const classifyAge = (
	ageMs: number
): "fresh" | "acceptable" | "stale" => {
	if (ageMs < FRESH_WITHIN_MS) {
		return "fresh";
	}
	return ageMs < ACCEPTABLE_WITHIN_MS ? "acceptable" : "stale";
};

/** Age of the newest stored record for `symbol`, judged against `now`. */
export const checkFreshness = async (
	store: RecordStore,
	symbol: string,
	now: WallClock
): Promise<FreshnessReport> => {
	try {
		const [latest] = await store.latest(symbol, 1);
		if (!latest) {
			return { symbol, status: "no_data" };
		}
		const scrapedMs = Date.parse(latest.scrapedAt);
		if (!Number.isFinite(scrapedMs)) {
			return {
				symbol,
				status: "error",
				error: `Unreadable scrapedAt ${latest.scrapedAt}`,
			};
		}
		const ageMs = now().getTime() - scrapedMs;
		return {
			symbol,
			status: classifyAge(ageMs),
			ageMinutes: ageMs / MINUTE_MS,
			ageHours: ageMs / HOUR_MS,
			scrapedAt: latest.scrapedAt,
			price: latest.price,
			indicatorCount: latest.technicalIndicators.length,
			overallSummary: latest.summary.overall,
		};
	} catch (error) {
		return { symbol, status: "error", error: describeError(error) };
	}
};

export const isHealthy = (report: FreshnessReport): boolean =>
	report.status === "fresh" || report.status === "acceptable";

const formatAge = (report: FreshnessReport): string =>
	(report.ageMinutes ?? 0) < 60
		? `${(report.ageMinutes ?? 0).toFixed(1)} minutes`
		: `${(report.ageHours ?? 0).toFixed(1)} hours`;

const formatPrice = (price: number): string =>
	`$${price.toLocaleString("en-US", {
		minimumFractionDigits: 2,
		maximumFractionDigits: 8,
	})}`;

/** Human-readable block for one symbol. */
export const formatFreshness = (report: FreshnessReport): string => {
	switch (report.status) {
		case "no_data":
			return `${report.symbol}: no_data (no stored records)`;
		case "error":
			return `${report.symbol}: error (${report.error ?? "unknown"})`;
		default: {
			const scraped = report.scrapedAt
				? `${new Date(report.scrapedAt).toISOString().slice(0, 19).replace("T", " ")} UTC`
				: "unknown";
			return [
				`${report.symbol}: ${report.status}`,
				`  Age: ${formatAge(report)}`,
				`  Scraped: ${scraped}`,
				`  Price: ${formatPrice(report.price ?? 0)}`,
				`  Indicators: ${report.indicatorCount ?? 0}`,
				`  Summary: ${report.overallSummary ?? "N/A"}`,
			].join("\n");
		}
	}
};
