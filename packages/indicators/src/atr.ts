export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

/** True range of each candle after the first, against the previous close. */
const trueRanges = (candles: AtrInput[]): number[] =>
	candles.slice(1).map((current, index) => {
		const previousClose = candles[index].close;
		return Math.max(
			current.high - current.low,
			Math.abs(current.high - previousClose),
			Math.abs(current.low - previousClose)
		);
	});

/**
 * Wilder-smoothed average true range, seeded with the mean of the first
 * `period` true ranges. Values keep full precision; sub-cent assets have
 * ranges far below any fixed rounding step.
 */
export function averageTrueRangeSeries(
	candles: AtrInput[],
	period = 14
): number[] {
	if (period <= 0 || candles.length < period + 1) {
		return [];
	}

	const ranges = trueRanges(candles);
	let atr = ranges.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	const series = [atr];
	for (const range of ranges.slice(period)) {
		atr = (atr * (period - 1) + range) / period;
		series.push(atr);
	}
	return series;
}

export function averageTrueRange(
	candles: AtrInput[],
	period = 14
): number | null {
	const series = averageTrueRangeSeries(candles, period);
	return series.length ? series[series.length - 1] : null;
}
