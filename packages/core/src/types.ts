export interface Candle {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume?: number;
}

/** Raw OHLC row as returned by CoinGecko: [timestamp, open, high, low, close]. */
export type OhlcRow = [number, number, number, number, number];

export type SummaryLabel =
	| "Strong Buy"
	| "Buy"
	| "Neutral"
	| "Sell"
	| "Strong Sell";

export type SignalBias = "buy" | "sell" | "neutral";

/**
 * Signal labels. The remote path only emits Buy, Sell and Neutral (N/A when
 * there is no price to compare against); the local path uses the rich labels
 * throughout.
 */
export type IndicatorSignal =
	| "Buy"
	| "Sell"
	| "Neutral"
	| "Overbought"
	| "Oversold"
	| "Accumulation"
	| "Distribution"
	| "High Volatility"
	| "Low Volatility"
	| "Bullish"
	| "Bearish"
	| "Buying Pressure"
	| "Selling Pressure"
	| "N/A";

export const NOT_APPLICABLE = "N/A" as const;
export type NotApplicable = typeof NOT_APPLICABLE;

export type IndicatorName =
	| "RSI(14)"
	| "MACD(12,26)"
	| "Bollinger Bands(20,2)"
	| "OBV"
	| "StochRSI"
	| "ATR(14)"
	| "VWAP"
	| "SuperTrend"
	| "CMF(20)";

export const INDICATOR_ORDER: readonly IndicatorName[] = [
	"RSI(14)",
	"MACD(12,26)",
	"Bollinger Bands(20,2)",
	"OBV",
	"StochRSI",
	"ATR(14)",
	"VWAP",
	"SuperTrend",
	"CMF(20)",
];

export interface ScalarIndicator {
	kind: "scalar";
	name: IndicatorName;
	value: number;
	signal: IndicatorSignal;
}

export interface BandIndicator {
	kind: "band";
	name: IndicatorName;
	upper: number;
	middle: number;
	lower: number;
	signal: IndicatorSignal;
}

export interface MacdIndicator {
	kind: "macd";
	name: IndicatorName;
	value: number;
	signalLine: number;
	histogram: number;
	signal: IndicatorSignal;
}

export type TrendDirection = "Uptrend" | "Downtrend";

export interface TrendIndicator {
	kind: "trend";
	name: IndicatorName;
	value: number | NotApplicable;
	signal: IndicatorSignal;
	trend: TrendDirection | NotApplicable;
}

export type IndicatorResult =
	| ScalarIndicator
	| BandIndicator
	| MacdIndicator
	| TrendIndicator;

export type IndicatorKind = IndicatorResult["kind"];

export type MovingAveragePeriod = 20 | 50 | 200;
export type MovingAverageType = "Simple" | "Exponential";

export interface MovingAverageResult {
	name: `MA${MovingAveragePeriod}`;
	period: MovingAveragePeriod;
	type: MovingAverageType;
	value: number;
	signal: IndicatorSignal;
}

export const MOVING_AVERAGE_PERIODS: readonly MovingAveragePeriod[] = [
	20, 50, 200,
];

export type PivotType = "Classic" | "Fibonacci" | "Camarilla" | "Woodie";

export interface PivotSet {
	type: PivotType;
	pivot: number;
	r1: number;
	r2: number;
	r3: number;
	s1: number;
	s2: number;
	s3: number;
}

export interface SummaryTriplet {
	overall: SummaryLabel;
	technicalIndicators: SummaryLabel;
	movingAverages: SummaryLabel;
}

export type SummaryPolicyName = "union-vote" | "agreement";

export interface FetchErrorEntry {
	key: string;
	message: string;
	attempts: number;
	status?: number;
}

export interface LocalRecordMetadata {
	provider: "local";
	dataPoints: number;
	/**
	 * "synthetic" when OBV, CMF and VWAP ran on the (high - low) * close * factor
	 * proxy instead of traded volume.
	 */
	volumeSource: "synthetic" | "reported";
	volumeProxyFactor: number | null;
	summaryPolicy: "agreement";
}

export interface RemoteRecordMetadata {
	provider: "taapi";
	exchange: string;
	interval: string;
	summaryPolicy: "union-vote";
	fetched: number;
	requested: number;
	successRatio: number;
	errors: FetchErrorEntry[];
	priceAvailable: boolean;
}

export type RecordMetadata = LocalRecordMetadata | RemoteRecordMetadata;

export interface TechnicalAnalysisRecord {
	readonly symbol: string;
	readonly price: number;
	readonly priceChange: number;
	readonly priceChangePercent: number;
	readonly summary: Readonly<SummaryTriplet>;
	readonly technicalIndicators: readonly Readonly<IndicatorResult>[];
	readonly movingAverages: readonly Readonly<MovingAverageResult>[];
	readonly pivotPoints: readonly Readonly<PivotSet>[];
	readonly sourceUrl: string;
	readonly scrapedAt: string;
	readonly metadata: Readonly<RecordMetadata>;
}

export interface PriceSnapshot {
	price: number;
	change24h: number;
	changePercent24h: number;
	marketCap: number;
	volume24h: number;
	asOf: number;
}

export const OHLC_DAYS = [1, 7, 14, 30, 90, 180, 365] as const;
export type OhlcDays = (typeof OHLC_DAYS)[number];
