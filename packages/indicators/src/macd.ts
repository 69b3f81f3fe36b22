import { emaSeries } from './ema';

export interface MacdResult {
  macd: number | null;
  signal: number | null;
  histogram: number | null;
}

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function macdSeries(
  closes: number[],
  fast: number,
  slow: number,
  signalLength: number
): MacdSeries {
  if (closes.length === 0 || slow <= 0 || fast <= 0 || signalLength <= 0) {
    return { macd: [], signal: [], histogram: [] };
  }

  const fastSeries = emaSeries(closes, fast);
  const slowSeries = emaSeries(closes, slow);
  const macdLine = fastSeries.map((fastValue, index) => fastValue - slowSeries[index]);
  const signalLine = emaSeries(macdLine, signalLength);
  const histogram = macdLine.map((value, index) => value - signalLine[index]);

  return { macd: macdLine, signal: signalLine, histogram };
}

/**
 * Latest MACD reading. Null until the slow average and the signal line have
 * both had a full window of input.
 */
export function macd(
  closes: number[],
  fast: number,
  slow: number,
  signalLength: number
): MacdResult {
  const warmup = Math.max(fast, slow) + signalLength - 1;
  if (closes.length < warmup) {
    return { macd: null, signal: null, histogram: null };
  }

  const series = macdSeries(closes, fast, slow, signalLength);
  const latestMacd = lastOf(series.macd);
  const signalValue = lastOf(series.signal);
  const histogram = latestMacd !== null && signalValue !== null ? latestMacd - signalValue : null;

  return {
    macd: latestMacd,
    signal: signalValue,
    histogram
  };
}

const lastOf = (values: number[]): number | null =>
  values.length ? values[values.length - 1] : null;
