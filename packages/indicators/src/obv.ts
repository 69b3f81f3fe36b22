export interface ObvInput {
	close: number;
	volume: number;
}

/**
 * Cumulative on-balance volume, starting at zero on the first candle. Volume
 * is added on up-closes, subtracted on down-closes, ignored on flat closes.
 */
export function obvSeries(candles: ObvInput[]): number[] {
	if (!candles.length) {
		return [];
	}

	const series: number[] = [0];
	let running = 0;
	for (let i = 1; i < candles.length; i += 1) {
		const change = candles[i].close - candles[i - 1].close;
		if (change > 0) {
			running += candles[i].volume;
		} else if (change < 0) {
			running -= candles[i].volume;
		}
		series.push(running);
	}
	return series;
}
