import axios from "axios";
import {
	OHLC_DAYS,
	loadCryptoRegistry,
	silentLogger,
	type Candle,
	type CryptoRegistry,
	type ModuleLogger,
	type OhlcDays,
	type PriceSnapshot,
	type PriceSource,
} from "@cryptota/core";
import {
	DEFAULT_TIMEOUT_MS,
	describeHttpError,
	isRecord,
	readFiniteNumber,
	type HttpClient,
} from "../http";

export const COINGECKO_BASE_URL = "https://api.coingecko.com/api/v3";

export interface CoinGeckoClientOptions {
	apiKey?: string;
	registry?: CryptoRegistry;
	/** Preconfigured HTTP client; built from `apiKey` when omitted. */
	http?: HttpClient;
	logger?: ModuleLogger;
}

export const isOhlcDays = (value: number): value is OhlcDays =>
	OHLC_DAYS.some((days) => days === value);

const isOhlcRow = (value: unknown): value is number[] =>
	Array.isArray(value) &&
	value.length >= 5 &&
	value.every((cell) => typeof cell === "number" && Number.isFinite(cell));

/**
 * CoinGecko REST client: spot price with 24h change, and OHLC history. The
 * demo API key, when set, goes in the `x-cg-demo-api-key` header.
 */
export class CoinGeckoClient implements PriceSource {
	private readonly http: HttpClient;
	private readonly registry: CryptoRegistry;
	private readonly logger: ModuleLogger;

	constructor(options: CoinGeckoClientOptions = {}) {
		this.registry = options.registry ?? loadCryptoRegistry();
		this.logger = options.logger ?? silentLogger;
		this.http =
			options.http ??
			axios.create({
				baseURL: COINGECKO_BASE_URL,
				timeout: DEFAULT_TIMEOUT_MS,
				headers: {
					Accept: "application/json",
					...(options.apiKey ? { "x-cg-demo-api-key": options.apiKey } : {}),
				},
			});
	}

	async getPrice(symbol: string): Promise<PriceSnapshot> {
		const crypto = this.registry.require(symbol);
		const body = await this.request("/simple/price", {
			ids: crypto.coingeckoId,
			vs_currencies: "usd",
			include_market_cap: "true",
			include_24hr_vol: "true",
			include_24hr_change: "true",
			include_last_updated_at: "true",
		});

		const coin = isRecord(body) ? body[crypto.coingeckoId] : undefined;
		const price = isRecord(coin) ? coin.usd : undefined;
		if (!isRecord(coin) || typeof price !== "number") {
			throw new Error(`No price data returned for ${crypto.symbol}`);
		}

		const changePercent24h = readFiniteNumber(coin.usd_24h_change);
		return {
			price,
			change24h: (price * changePercent24h) / 100,
			changePercent24h,
			marketCap: readFiniteNumber(coin.usd_market_cap),
			volume24h: readFiniteNumber(coin.usd_24h_vol),
			asOf: readFiniteNumber(coin.last_updated_at) * 1000,
		};
	}

	/** Candles without volume, ascending; CoinGecko picks the granularity from `days`. */
	async getOhlc(symbol: string, days: OhlcDays): Promise<Candle[]> {
		if (!isOhlcDays(days)) {
			throw new RangeError(
				`Invalid days parameter ${String(days)}. Must be one of: ${OHLC_DAYS.join(", ")}`
			);
		}
		const crypto = this.registry.require(symbol);
		const body = await this.request(`/coins/${crypto.coingeckoId}/ohlc`, {
			vs_currency: "usd",
			days: String(days),
		});
		if (!Array.isArray(body)) {
			throw new Error(`Unexpected OHLC response for ${crypto.symbol}`);
		}

		return body
			.filter(isOhlcRow)
			.map(([timestamp, open, high, low, close]) => ({
				timestamp,
				open,
				high,
				low,
				close,
			}))
			.sort((left, right) => left.timestamp - right.timestamp);
	}

	/** Connectivity check against `/ping`. */
	async ping(): Promise<boolean> {
		try {
			await this.http.get<unknown>("/ping");
			return true;
		} catch (error) {
			this.logger.warn("coingecko_ping_failed", { ...describeHttpError(error) });
			return false;
		}
	}

	private async request(
		endpoint: string,
		params: Record<string, string>
	): Promise<unknown> {
		try {
			const response = await this.http.get<unknown>(endpoint, { params });
			return response.data;
		} catch (error) {
			const failure = describeHttpError(error);
			this.logger.error("coingecko_request_failed", { endpoint, ...failure });
			throw new Error(`CoinGecko request ${endpoint} failed: ${failure.message}`, {
				cause: error,
			});
		}
	}
}
