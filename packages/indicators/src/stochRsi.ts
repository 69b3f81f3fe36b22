import { rsiSeries } from "./rsi";
import { smaSeries } from "./sma";

export interface StochRsiOptions {
	period?: number;
	smoothK?: number;
	smoothD?: number;
}

export interface StochRsiResult {
	/** %K on a 0-100 scale. */
	k: number;
	/** %D on a 0-100 scale, null until %K has a full smoothing window. */
	d: number | null;
}

/**
 * Stochastic oscillator over RSI values. A lookback window whose RSI never
 * moves has no defined position, so it yields no reading.
 */
export function stochRsi(
	closes: number[],
	options: StochRsiOptions = {}
): StochRsiResult | null {
	const period = options.period ?? 14;
	const smoothK = options.smoothK ?? 3;
	const smoothD = options.smoothD ?? 3;

	const rsis = rsiSeries(closes, period);
	if (rsis.length < period) {
		return null;
	}

	const raw: Array<number | null> = rsis.map((_, index) => {
		if (index < period - 1) {
			return null;
		}
		const window = rsis.slice(index - period + 1, index + 1);
		const min = Math.min(...window);
		const max = Math.max(...window);
		if (max === min) {
			return null;
		}
		return (rsis[index] - min) / (max - min);
	});

	const kSeries = smaSeries(raw, smoothK);
	const dSeries = smaSeries(kSeries, smoothD);
	const k = kSeries[kSeries.length - 1];
	if (k === null || k === undefined) {
		return null;
	}
	const d = dSeries[dSeries.length - 1] ?? null;

	return {
		k: clampPercent(k * 100),
		d: d === null ? null : clampPercent(d * 100),
	};
}

const clampPercent = (value: number): number =>
	Math.min(100, Math.max(0, value));
