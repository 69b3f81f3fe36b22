/**
 * Wilder RSI. The first value lands at index `period`; a window with no
 * movement at all reads 50.
 */
export function rsiSeries(values: number[], period = 14): number[] {
  if (period <= 0) {
    throw new Error('RSI period must be positive');
  }

  if (values.length <= period) {
    return [];
  }

  let gains = 0;
  let losses = 0;

  for (let i = 1; i <= period; i += 1) {
    const change = values[i] - values[i - 1];
    if (change >= 0) {
      gains += change;
    } else {
      losses -= change;
    }
  }

  const rsis: number[] = [];
  let avgGain = gains / period;
  let avgLoss = losses / period;

  for (let i = period; i < values.length; i += 1) {
    if (i > period) {
      const change = values[i] - values[i - 1];
      const gain = Math.max(change, 0);
      const loss = Math.max(-change, 0);
      avgGain = (avgGain * (period - 1) + gain) / period;
      avgLoss = (avgLoss * (period - 1) + loss) / period;
    }

    rsis.push(rsiFromAverages(avgGain, avgLoss));
  }

  return rsis;
}

export function rsi(values: number[], period = 14): number | null {
  const series = rsiSeries(values, period);
  return series.length ? series[series.length - 1] : null;
}

const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
  if (avgGain === 0 && avgLoss === 0) {
    return 50;
  }
  if (avgLoss === 0) {
    return 100;
  }
  const value = 100 - 100 / (1 + avgGain / avgLoss);
  return Math.min(100, Math.max(0, value));
};
