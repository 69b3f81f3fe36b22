/**
 * Exponential moving average seeded with the first value
 * (`ema[0] = values[0]`, then `ema[i] = (values[i] - ema[i-1]) * k + ema[i-1]`
 * with `k = 2 / (length + 1)`). A value exists as soon as one input does, so
 * long windows still resolve on short histories.
 */
export function emaSeries(values: number[], length: number): number[] {
  if (length <= 0 || values.length === 0) {
    return [];
  }

  const multiplier = 2 / (length + 1);
  const series: number[] = [values[0]];
  let emaValue = values[0];

  for (let i = 1; i < values.length; i += 1) {
    emaValue = (values[i] - emaValue) * multiplier + emaValue;
    series.push(emaValue);
  }

  return series;
}

export function ema(values: number[], length: number): number | null {
  const series = emaSeries(values, length);
  return series.length ? series[series.length - 1] : null;
}
