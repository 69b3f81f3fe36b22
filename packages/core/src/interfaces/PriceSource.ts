import type { Candle, OhlcDays, PriceSnapshot } from "../types";

/**
 * Spot price and OHLC history for a supported symbol.
 */
export interface PriceSource {
	getPrice(symbol: string): Promise<PriceSnapshot>;
	/**
	 * Candles in ascending timestamp order. Volume is left undefined when the
	 * upstream series does not report it.
	 */
	getOhlc(symbol: string, days: OhlcDays): Promise<Candle[]>;
}
