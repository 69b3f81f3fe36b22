export function sma(values: number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	const window = values.slice(values.length - period);
	const sum = window.reduce((acc, value) => acc + value, 0);
	return sum / period;
}

/** Rolling simple average; entries before the first full window are null. */
export function smaSeries(
	values: Array<number | null>,
	period: number
): Array<number | null> {
	const series: Array<number | null> = new Array(values.length).fill(null);
	if (period <= 0) {
		return series;
	}

	for (let i = period - 1; i < values.length; i += 1) {
		let sum = 0;
		let complete = true;
		for (let j = i - period + 1; j <= i; j += 1) {
			const value = values[j];
			if (value === null) {
				complete = false;
				break;
			}
			sum += value;
		}
		if (complete) {
			series[i] = sum / period;
		}
	}

	return series;
}
