export interface VwapCandle {
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Volume-weighted typical price `(high + low + close) / 3` over the trailing
 * `period` candles. Candles without volume carry no weight; null when the
 * whole window has none.
 */
export const rollingVwap = (
	candles: VwapCandle[],
	period: number
): number | null => {
	if (period <= 0 || candles.length < period) {
		return null;
	}

	let weighted = 0;
	let traded = 0;
	for (const { high, low, close, volume } of candles.slice(-period)) {
		if (volume > 0) {
			weighted += ((high + low + close) / 3) * volume;
			traded += volume;
		}
	}
	return traded > 0 ? weighted / traded : null;
};
