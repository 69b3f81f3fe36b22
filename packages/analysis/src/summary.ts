import type {
	IndicatorResult,
	IndicatorSignal,
	MovingAverageResult,
	SummaryLabel,
	SummaryPolicyName,
	SummaryTriplet,
} from "@cryptota/core";
import { signalBias } from "./signals";

export interface SignalTally {
	buy: number;
	sell: number;
	total: number;
}

export const STRONG_RATIO = 0.7;
export const MAJORITY_RATIO = 0.5;

export const tallySignals = (signals: readonly IndicatorSignal[]): SignalTally =>
	signals.reduce<SignalTally>(
		(tally, signal) => {
			const bias = signalBias(signal);
			return {
				buy: tally.buy + (bias === "buy" ? 1 : 0),
				sell: tally.sell + (bias === "sell" ? 1 : 0),
				total: tally.total + 1,
			};
		},
		{ buy: 0, sell: 0, total: 0 }
	);

/**
 * Ratio vote. Buy thresholds are checked before sell thresholds; an empty
 * tally is Neutral.
 */
export const labelFromTally = ({ buy, sell, total }: SignalTally): SummaryLabel => {
	if (total === 0) {
		return "Neutral";
	}
	const buyRatio = buy / total;
	const sellRatio = sell / total;
	if (buyRatio >= STRONG_RATIO) {
		return "Strong Buy";
	}
	if (buyRatio >= MAJORITY_RATIO) {
		return "Buy";
	}
	if (sellRatio >= STRONG_RATIO) {
		return "Strong Sell";
	}
	if (sellRatio >= MAJORITY_RATIO) {
		return "Sell";
	}
	return "Neutral";
};

export const summarizeSignals = (
	signals: readonly IndicatorSignal[]
): SummaryLabel => labelFromTally(tallySignals(signals));

export interface SummaryPolicyInput {
	indicatorSignals: readonly IndicatorSignal[];
	movingAverageSignals: readonly IndicatorSignal[];
	technicalIndicators: SummaryLabel;
	movingAverages: SummaryLabel;
}

/**
 * Derives the overall label once the two sub-summaries are known. The two
 * acquisition paths use different policies on purpose; they are kept apart
 * until a single rule is chosen.
 */
export interface SummaryPolicy {
	readonly name: SummaryPolicyName;
	overall(input: SummaryPolicyInput): SummaryLabel;
}

/** Re-votes over the union of indicator and moving-average signals. */
export const UnionVotePolicy: SummaryPolicy = {
	name: "union-vote",
	overall: ({ indicatorSignals, movingAverageSignals }) =>
		summarizeSignals([...indicatorSignals, ...movingAverageSignals]),
};

const isBullish = (label: SummaryLabel): boolean =>
	label === "Buy" || label === "Strong Buy";
const isBearish = (label: SummaryLabel): boolean =>
	label === "Sell" || label === "Strong Sell";

/** Buy or Sell only when both sub-summaries lean the same way. */
export const AgreementPolicy: SummaryPolicy = {
	name: "agreement",
	overall: ({ technicalIndicators, movingAverages }) => {
		if (isBullish(technicalIndicators) && isBullish(movingAverages)) {
			return "Buy";
		}
		if (isBearish(technicalIndicators) && isBearish(movingAverages)) {
			return "Sell";
		}
		return "Neutral";
	},
};

export const buildSummary = (
	indicators: readonly IndicatorResult[],
	movingAverages: readonly MovingAverageResult[],
	policy: SummaryPolicy
): SummaryTriplet => {
	const indicatorSignals = indicators.map((indicator) => indicator.signal);
	const movingAverageSignals = movingAverages.map((average) => average.signal);
	const technicalIndicators = summarizeSignals(indicatorSignals);
	const movingAveragesLabel = summarizeSignals(movingAverageSignals);

	return {
		overall: policy.overall({
			indicatorSignals,
			movingAverageSignals,
			technicalIndicators,
			movingAverages: movingAveragesLabel,
		}),
		technicalIndicators,
		movingAverages: movingAveragesLabel,
	};
};
