import type { IndicatorParams, IndicatorPayload } from "@cryptota/core";

export interface IndicatorSpec {
	/** Result-map key, unique per spec ("rsi", "ema50"). */
	key: string;
	/** Endpoint name on the indicator API. */
	indicator: string;
	params: IndicatorParams;
}

/**
 * Field groups a payload must carry to be usable. Every group needs at least
 * one numeric member.
 */
const REQUIRED_FIELDS: Record<string, string[][]> = {
	rsi: [["value"]],
	macd: [["valueMACD"], ["valueMACDSignal"]],
	bbands: [["valueUpperBand"], ["valueMiddleBand"], ["valueLowerBand"]],
	obv: [["value"]],
	stochrsi: [["valueK", "valueFastK"]],
	atr: [["value"]],
	vwap: [["value"]],
	supertrend: [["value"], ["trend", "valueAdvice"]],
	cmf: [["value"]],
	ema: [["value"]],
};

export const DEFAULT_INDICATOR_SPECS: readonly IndicatorSpec[] = [
	{ key: "rsi", indicator: "rsi", params: { period: 14 } },
	{ key: "macd", indicator: "macd", params: {} },
	{ key: "bbands", indicator: "bbands", params: { period: 20, stddev: 2 } },
	{ key: "obv", indicator: "obv", params: {} },
	{ key: "stochrsi", indicator: "stochrsi", params: {} },
	{ key: "atr", indicator: "atr", params: { period: 14 } },
	{ key: "vwap", indicator: "vwap", params: {} },
	{ key: "supertrend", indicator: "supertrend", params: {} },
	{ key: "cmf", indicator: "cmf", params: { period: 20 } },
	{ key: "ema20", indicator: "ema", params: { period: 20 } },
	{ key: "ema50", indicator: "ema", params: { period: 50 } },
	{ key: "ema200", indicator: "ema", params: { period: 200 } },
];

/** Fields carrying a label rather than a number. */
const TEXT_FIELDS = new Set(["valueAdvice"]);

const isPresent = (payload: IndicatorPayload, field: string): boolean => {
	if (TEXT_FIELDS.has(field)) {
		const raw = payload[field];
		return typeof raw === "string" && raw.trim() !== "";
	}
	return readNumber(payload, field) !== null;
};

/**
 * True when the payload carries what the formatter needs. Empty bodies and
 * payloads missing a required field count as failed fetches.
 */
export const isCompletePayload = (
	spec: IndicatorSpec,
	payload: IndicatorPayload
): boolean => {
	if (Object.keys(payload).length === 0) {
		return false;
	}
	const groups = REQUIRED_FIELDS[spec.indicator];
	if (!groups) {
		return true;
	}
	return groups.every((group) => group.some((field) => isPresent(payload, field)));
};

/** Reads a numeric field, accepting numeric strings. */
export const readNumber = (
	payload: IndicatorPayload | undefined,
	field: string
): number | null => {
	const raw = payload?.[field];
	if (typeof raw === "number") {
		return Number.isFinite(raw) ? raw : null;
	}
	if (typeof raw === "string" && raw.trim() !== "") {
		const parsed = Number(raw);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};
