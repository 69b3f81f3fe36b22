import {
	InsufficientDataError,
	NOT_APPLICABLE,
	MOVING_AVERAGE_PERIODS,
	type Candle,
	type IndicatorResult,
	type LocalRecordMetadata,
	type ModuleLogger,
	type MovingAverageResult,
	type OhlcRow,
	type PivotSet,
	type PivotType,
	type TechnicalAnalysisRecord,
	type WallClock,
} from "@cryptota/core";
import {
	averageTrueRange,
	bollingerBands,
	chaikinMoneyFlow,
	ema,
	macd,
	obvSeries,
	pivotLevels,
	rollingVwap,
	rsi,
	stochRsi,
} from "@cryptota/indicators";
import { assembleRecord } from "./schema";
import { localSignals } from "./signals";
import { AgreementPolicy } from "./summary";

export const MIN_CANDLES = 50;
/** Multiplier of the synthetic volume proxy `(high - low) * close * k`. */
export const VOLUME_PROXY_FACTOR = 1000;
export const VWAP_WINDOW = 14;

export interface ComputeOptions {
	/** CoinGecko id used for `sourceUrl`; defaults to the lower-cased symbol. */
	coingeckoId?: string;
	pivotTypes?: PivotType[];
	now?: WallClock;
	logger?: ModuleLogger;
}

interface VolumeCandle extends Candle {
	volume: number;
}

const toCandle = (input: Candle | OhlcRow): Candle => {
	if (Array.isArray(input)) {
		const [timestamp, open, high, low, close] = input;
		return { timestamp, open, high, low, close };
	}
	return input;
};

const hasReportedVolume = (candles: readonly Candle[]): boolean =>
	candles.every(
		(candle) =>
			typeof candle.volume === "number" &&
			Number.isFinite(candle.volume) &&
			candle.volume >= 0
	);

/**
 * Attaches the volume OBV, CMF and VWAP run on. Without traded volume on every
 * candle the proxy is used for all of them, never a mix.
 */
const withVolume = (
	candles: readonly Candle[]
): { candles: VolumeCandle[]; synthetic: boolean } => {
	if (hasReportedVolume(candles)) {
		return {
			candles: candles.map((candle) => ({
				...candle,
				volume: candle.volume ?? 0,
			})),
			synthetic: false,
		};
	}
	return {
		candles: candles.map((candle) => ({
			...candle,
			volume: (candle.high - candle.low) * candle.close * VOLUME_PROXY_FACTOR,
		})),
		synthetic: true,
	};
};

const computeIndicators = (
	candles: VolumeCandle[],
	closes: number[],
	price: number
): IndicatorResult[] => {
	const indicators: IndicatorResult[] = [];

	const rsiValue = rsi(closes, 14);
	if (rsiValue !== null) {
		indicators.push({
			kind: "scalar",
			name: "RSI(14)",
			value: rsiValue,
			signal: localSignals.rsi(rsiValue),
		});
	}

	const macdValue = macd(closes, 12, 26, 9);
	if (
		macdValue.macd !== null &&
		macdValue.signal !== null &&
		macdValue.histogram !== null
	) {
		indicators.push({
			kind: "macd",
			name: "MACD(12,26)",
			value: macdValue.macd,
			signalLine: macdValue.signal,
			histogram: macdValue.histogram,
			signal: localSignals.macd(macdValue.macd, macdValue.signal),
		});
	}

	const bands = bollingerBands(closes, 20, 2);
	if (bands) {
		indicators.push({
			kind: "band",
			name: "Bollinger Bands(20,2)",
			...bands,
			signal: localSignals.bollinger(price, bands),
		});
	}

	const obv = obvSeries(candles);
	if (obv.length >= 2) {
		const current = obv[obv.length - 1];
		indicators.push({
			kind: "scalar",
			name: "OBV",
			value: current,
			signal: localSignals.obv(current, obv[obv.length - 2]),
		});
	}

	const stoch = stochRsi(closes, { period: 14, smoothK: 3, smoothD: 3 });
	if (stoch) {
		indicators.push({
			kind: "scalar",
			name: "StochRSI",
			value: stoch.k,
			signal: localSignals.stochRsi(stoch.k),
		});
	}

	const atr = averageTrueRange(candles, 14);
	if (atr !== null) {
		indicators.push({
			kind: "scalar",
			name: "ATR(14)",
			value: atr,
			signal: localSignals.atr(atr, price),
		});
	}

	const vwap = rollingVwap(candles, VWAP_WINDOW);
	if (vwap !== null) {
		indicators.push({
			kind: "scalar",
			name: "VWAP",
			value: vwap,
			signal: localSignals.vwap(price, vwap),
		});
	}

	// Needs an ATR band history the candle source does not give us.
	indicators.push({
		kind: "trend",
		name: "SuperTrend",
		value: NOT_APPLICABLE,
		signal: NOT_APPLICABLE,
		trend: NOT_APPLICABLE,
	});

	const cmf = chaikinMoneyFlow(candles, 20);
	if (cmf !== null) {
		indicators.push({
			kind: "scalar",
			name: "CMF(20)",
			value: cmf,
			signal: localSignals.cmf(cmf),
		});
	}

	return indicators;
};

const computeMovingAverages = (
	closes: number[],
	price: number
): MovingAverageResult[] =>
	MOVING_AVERAGE_PERIODS.flatMap<MovingAverageResult>((period) => {
		const value = ema(closes, period);
		if (value === null) {
			return [];
		}
		return [
			{
				name: `MA${period}` as const,
				period,
				type: "Exponential",
				value,
				signal: localSignals.movingAverage(price, value),
			},
		];
	});

/** Levels from the previous completed candle. */
const computePivots = (
	candles: readonly Candle[],
	types: readonly PivotType[]
): PivotSet[] => {
	const previous = candles[candles.length - 2];
	return types.map((type) => ({ type, ...pivotLevels(type, previous) }));
};

/**
 * Local acquisition path: computes the full indicator set from an OHLC
 * series. Candles may arrive in any order and as raw `[t, o, h, l, c]` rows.
 *
 * @throws InsufficientDataError with fewer than 50 candles
 */
export const computeFromOhlc = (
	symbol: string,
	input: ReadonlyArray<Candle | OhlcRow>,
	options: ComputeOptions = {}
): TechnicalAnalysisRecord => {
	if (input.length < MIN_CANDLES) {
		throw new InsufficientDataError(MIN_CANDLES, input.length);
	}

	const sorted = input
		.map(toCandle)
		.sort((left, right) => left.timestamp - right.timestamp);
	const { candles, synthetic } = withVolume(sorted);
	const closes = candles.map((candle) => candle.close);

	const price = closes[closes.length - 1];
	const previousClose = closes[closes.length - 2];
	const priceChange = price - previousClose;
	const priceChangePercent =
		previousClose === 0 ? 0 : (priceChange / previousClose) * 100;

	const metadata: LocalRecordMetadata = {
		provider: "local",
		dataPoints: candles.length,
		volumeSource: synthetic ? "synthetic" : "reported",
		volumeProxyFactor: synthetic ? VOLUME_PROXY_FACTOR : null,
		summaryPolicy: "agreement",
	};

	const upperSymbol = symbol.toUpperCase();
	const coinId = options.coingeckoId ?? symbol.toLowerCase();

	return assembleRecord(
		{
			symbol: upperSymbol,
			price,
			priceChange,
			priceChangePercent,
			technicalIndicators: computeIndicators(candles, closes, price),
			movingAverages: computeMovingAverages(closes, price),
			pivotPoints: computePivots(candles, options.pivotTypes ?? ["Classic"]),
			sourceUrl: `https://www.coingecko.com/en/coins/${coinId}`,
			metadata,
			summaryPolicy: AgreementPolicy,
		},
		{ now: options.now, logger: options.logger }
	);
};
