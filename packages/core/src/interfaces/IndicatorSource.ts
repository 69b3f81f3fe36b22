/** Decoded JSON body of one indicator request. */
export type IndicatorPayload = Record<string, unknown>;

export type IndicatorParams = Record<string, string | number | boolean>;

/**
 * Remote source of pre-computed indicator values, one indicator per request.
 *
 * Implementations throw on network errors, non-2xx responses and bodies that
 * are not JSON objects. They do not retry or throttle: both belong to the
 * caller, which shares a single request quota across every indicator.
 */
export interface IndicatorSource {
	/**
	 * @param indicator - Endpoint name (e.g. "rsi", "bbands", "ema")
	 * @param symbolPair - Trading pair (e.g. "BTC/USDT")
	 * @param exchange - Exchange the candles come from (e.g. "binance")
	 * @param interval - Candle interval (e.g. "1h")
	 */
	fetch(
		indicator: string,
		symbolPair: string,
		exchange: string,
		interval: string,
		params: IndicatorParams
	): Promise<IndicatorPayload>;
}
