import {
	NOT_APPLICABLE,
	MOVING_AVERAGE_PERIODS,
	type IndicatorPayload,
	type IndicatorResult,
	type IndicatorSignal,
	type MovingAverageResult,
	type TrendDirection,
} from "@cryptota/core";
import { remoteSignals } from "../signals";
import { readNumber } from "./indicatorSpecs";

/** Successful payloads by request key. */
export type PayloadMap = ReadonlyMap<string, IndicatorPayload>;

/** Current price, or null when no price could be obtained. */
export type KnownPrice = number | null;

const withPrice = (
	price: KnownPrice,
	classify: (price: number) => IndicatorSignal
): IndicatorSignal => (price === null ? NOT_APPLICABLE : classify(price));

/**
 * SuperTrend direction from either the numeric `trend` field (1 up) or the
 * `valueAdvice` label ("long"/"short").
 */
export const readTrend = (payload: IndicatorPayload): TrendDirection | null => {
	const numeric = readNumber(payload, "trend");
	if (numeric !== null) {
		return numeric === 1 ? "Uptrend" : "Downtrend";
	}
	const advice = payload.valueAdvice;
	if (typeof advice === "string") {
		return advice.trim().toLowerCase() === "long" ? "Uptrend" : "Downtrend";
	}
	return null;
};

/**
 * Indicator entries for every payload that parsed; missing keys are omitted.
 * Band and VWAP signals prefer the candle close the payload reports.
 */
export const formatRemoteIndicators = (
	payloads: PayloadMap,
	price: KnownPrice
): IndicatorResult[] => {
	const indicators: IndicatorResult[] = [];

	const rsi = readNumber(payloads.get("rsi"), "value");
	if (rsi !== null) {
		indicators.push({
			kind: "scalar",
			name: "RSI(14)",
			value: rsi,
			signal: remoteSignals.rsi(rsi),
		});
	}

	const macdPayload = payloads.get("macd");
	const macdLine = readNumber(macdPayload, "valueMACD");
	const macdSignal = readNumber(macdPayload, "valueMACDSignal");
	if (macdLine !== null && macdSignal !== null) {
		indicators.push({
			kind: "macd",
			name: "MACD(12,26)",
			value: macdLine,
			signalLine: macdSignal,
			histogram:
				readNumber(macdPayload, "valueMACDHist") ?? macdLine - macdSignal,
			signal: remoteSignals.macd(macdLine, macdSignal),
		});
	}

	const bandsPayload = payloads.get("bbands");
	const upper = readNumber(bandsPayload, "valueUpperBand");
	const middle = readNumber(bandsPayload, "valueMiddleBand");
	const lower = readNumber(bandsPayload, "valueLowerBand");
	if (upper !== null && middle !== null && lower !== null) {
		const close = readNumber(bandsPayload, "close") ?? price ?? middle;
		indicators.push({
			kind: "band",
			name: "Bollinger Bands(20,2)",
			upper,
			middle,
			lower,
			signal: remoteSignals.bollinger(close, { upper, lower }),
		});
	}

	const obv = readNumber(payloads.get("obv"), "value");
	if (obv !== null) {
		indicators.push({
			kind: "scalar",
			name: "OBV",
			value: obv,
			signal: remoteSignals.obv(obv),
		});
	}

	const stochPayload = payloads.get("stochrsi");
	const k =
		readNumber(stochPayload, "valueK") ??
		readNumber(stochPayload, "valueFastK");
	if (k !== null) {
		indicators.push({
			kind: "scalar",
			name: "StochRSI",
			value: k,
			signal: remoteSignals.stochRsi(k),
		});
	}

	const atr = readNumber(payloads.get("atr"), "value");
	if (atr !== null) {
		indicators.push({
			kind: "scalar",
			name: "ATR(14)",
			value: atr,
			signal: remoteSignals.atr(),
		});
	}

	const vwapPayload = payloads.get("vwap");
	const vwap = readNumber(vwapPayload, "value");
	if (vwap !== null) {
		const close = readNumber(vwapPayload, "close") ?? price;
		indicators.push({
			kind: "scalar",
			name: "VWAP",
			value: vwap,
			signal: withPrice(close, (current) => remoteSignals.vwap(current, vwap)),
		});
	}

	const superTrendPayload = payloads.get("supertrend");
	const superTrend = readNumber(superTrendPayload, "value");
	const trend = superTrendPayload ? readTrend(superTrendPayload) : null;
	if (superTrend !== null && trend !== null) {
		indicators.push({
			kind: "trend",
			name: "SuperTrend",
			value: superTrend,
			signal: remoteSignals.superTrend(trend),
			trend,
		});
	}

	const cmf = readNumber(payloads.get("cmf"), "value");
	if (cmf !== null) {
		indicators.push({
			kind: "scalar",
			name: "CMF(20)",
			value: cmf,
			signal: remoteSignals.cmf(cmf),
		});
	}

	return indicators;
};

/** EMA entries keyed `ema<period>`; signals are "N/A" without a price. */
export const formatRemoteMovingAverages = (
	payloads: PayloadMap,
	price: KnownPrice
): MovingAverageResult[] =>
	MOVING_AVERAGE_PERIODS.flatMap<MovingAverageResult>((period) => {
		const value = readNumber(payloads.get(`ema${period}`), "value");
		if (value === null) {
			return [];
		}
		return [
			{
				name: `MA${period}` as const,
				period,
				type: "Exponential",
				value,
				signal: withPrice(price, (current) =>
					remoteSignals.movingAverage(current, value)
				),
			},
		];
	});

/**
 * Best price the indicator payloads carry: the candle close reported with
 * RSI, Bollinger Bands or VWAP, in that order.
 */
export const priceFromPayloads = (payloads: PayloadMap): KnownPrice => {
	for (const key of ["rsi", "bbands", "vwap"]) {
		const close = readNumber(payloads.get(key), "close");
		if (close !== null) {
			return close;
		}
	}
	return null;
};
