/**
 * Deterministic indicator math over plain number arrays and candle-like
 * objects. No I/O, no shared state.
 */
export { ema, emaSeries } from "./ema";
export { sma, smaSeries } from "./sma";
export { rsi, rsiSeries } from "./rsi";
export { macd, macdSeries } from "./macd";
export type { MacdResult, MacdSeries } from "./macd";
export { bollingerBands } from "./bollinger";
export type { BollingerBands } from "./bollinger";
export { obvSeries } from "./obv";
export type { ObvInput } from "./obv";
export { stochRsi } from "./stochRsi";
export type { StochRsiOptions, StochRsiResult } from "./stochRsi";
export { averageTrueRange, averageTrueRangeSeries } from "./atr";
export type { AtrInput } from "./atr";
export { rollingVwap } from "./vwap";
export type { VwapCandle } from "./vwap";
export { chaikinMoneyFlow } from "./cmf";
export type { CmfInput } from "./cmf";
export {
	camarillaPivots,
	classicPivots,
	fibonacciPivots,
	pivotLevels,
	woodiePivots,
} from "./pivots";
export type { PivotInput, PivotLevels, PivotMethod } from "./pivots";
