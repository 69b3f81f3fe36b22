import { sma } from "./sma";

export interface BollingerBands {
	upper: number;
	middle: number;
	lower: number;
}

/**
 * Bands around the trailing simple average using the population standard
 * deviation of the same window.
 */
export function bollingerBands(
	closes: number[],
	period = 20,
	deviations = 2
): BollingerBands | null {
	const middle = sma(closes, period);
	if (middle === null) {
		return null;
	}

	const window = closes.slice(closes.length - period);
	const variance =
		window.reduce((acc, value) => acc + (value - middle) ** 2, 0) / period;
	const spread = Math.sqrt(variance) * deviations;

	return {
		upper: middle + spread,
		middle,
		lower: middle - spread,
	};
}
