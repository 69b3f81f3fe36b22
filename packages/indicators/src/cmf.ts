export interface CmfInput {
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Chaikin Money Flow over the trailing `period` candles. A candle with no
 * range contributes zero flow; null when the window carries no volume.
 */
export function chaikinMoneyFlow(
	candles: CmfInput[],
	period = 20
): number | null {
	if (period <= 0 || candles.length < period) {
		return null;
	}

	let flowSum = 0;
	let volumeSum = 0;
	for (const candle of candles.slice(-period)) {
		const range = candle.high - candle.low;
		const multiplier =
			range === 0
				? 0
				: (candle.close - candle.low - (candle.high - candle.close)) / range;
		flowSum += multiplier * candle.volume;
		volumeSum += candle.volume;
	}

	if (volumeSum <= 0) {
		return null;
	}
	return flowSum / volumeSum;
}
