import type { OHLCV } from "ccxt";
import type { Candle } from "@cryptota/core";

/** Maps one CCXT OHLCV row to a candle carrying the exchange's traded volume. */
export const mapCcxtRowToCandle = (row: OHLCV): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};
