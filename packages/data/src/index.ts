export {
	DEFAULT_TIMEOUT_MS,
	describeHttpError,
	type HttpClient,
	type HttpFailure,
} from "./http";
export {
	COINGECKO_BASE_URL,
	CoinGeckoClient,
	isOhlcDays,
	type CoinGeckoClientOptions,
} from "./coingecko/coinGeckoClient";
export {
	TAAPI_BASE_URL,
	TaapiIndicatorSource,
	type TaapiIndicatorSourceOptions,
} from "./taapi/taapiIndicatorSource";
export {
	CcxtMarketSource,
	createMarketClient,
	supportedExchanges,
	timeframeForDays,
	type CcxtMarketSourceOptions,
	type MarketClient,
} from "./ccxt/ccxtMarketSource";
export { mapCcxtRowToCandle } from "./ccxt/ccxtMapper";
