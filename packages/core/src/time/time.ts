/**
 * Interval helpers. All values are UTC epoch milliseconds.
 */

export type IntervalUnit = "m" | "h" | "d" | "w";

export interface ParsedInterval {
	unit: IntervalUnit;
	n: number;
	ms: number;
}

const UNIT_MS: Record<IntervalUnit, number> = {
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
	w: 604_800_000,
};

const isIntervalUnit = (value: string): value is IntervalUnit =>
	value in UNIT_MS;

/**
 * Parse an indicator interval such as "15m", "1h", "4h", "1d" or "1w".
 * @throws Error if the interval format is invalid
 */
export const parseInterval = (interval: string): ParsedInterval => {
	if (!interval || typeof interval !== "string") {
		throw new Error(
			`Invalid interval: expected string, got ${typeof interval}`
		);
	}

	const trimmed = interval.trim().toLowerCase();
	const match = trimmed.match(/^(\d+)([mhdw])$/);
	if (!match || !isIntervalUnit(match[2])) {
		throw new Error(
			`Invalid interval format: "${interval}". Expected format like "15m", "1h", "1d", "1w"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid interval: period must be positive, got ${n} in "${interval}"`
		);
	}

	const unit = match[2];
	return { unit, n, ms: n * UNIT_MS[unit] };
};

/** Canonical lower-case form, e.g. " 1H " -> "1h". */
export const normalizeInterval = (interval: string): string => {
	const { n, unit } = parseInterval(interval);
	return `${n}${unit}`;
};
