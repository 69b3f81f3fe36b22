import axios from "axios";
import {
	IndicatorFetchError,
	silentLogger,
	type IndicatorParams,
	type IndicatorPayload,
	type IndicatorSource,
	type ModuleLogger,
} from "@cryptota/core";
import {
	DEFAULT_TIMEOUT_MS,
	describeHttpError,
	isRecord,
	type HttpClient,
} from "../http";

export const TAAPI_BASE_URL = "https://api.taapi.io";

export interface TaapiIndicatorSourceOptions {
	apiKey: string;
	http?: HttpClient;
	logger?: ModuleLogger;
}

/**
 * One GET per indicator: `/<indicator>?secret&exchange&symbol&interval&...`.
 * Throttling and retries are left to the caller.
 */
export class TaapiIndicatorSource implements IndicatorSource {
	private readonly apiKey: string;
	private readonly http: HttpClient;
	private readonly logger: ModuleLogger;

	constructor(options: TaapiIndicatorSourceOptions) {
		if (!options.apiKey) {
			throw new Error("TAAPI_API_KEY is not set");
		}
		this.apiKey = options.apiKey;
		this.logger = options.logger ?? silentLogger;
		this.http =
			options.http ??
			axios.create({ baseURL: TAAPI_BASE_URL, timeout: DEFAULT_TIMEOUT_MS });
	}

	async fetch(
		indicator: string,
		symbolPair: string,
		exchange: string,
		interval: string,
		params: IndicatorParams
	): Promise<IndicatorPayload> {
		let data: unknown;
		try {
			const response = await this.http.get<unknown>(`/${indicator}`, {
				params: {
					secret: this.apiKey,
					exchange,
					symbol: symbolPair,
					interval,
					...params,
				},
			});
			data = response.data;
		} catch (error) {
			const failure = describeHttpError(error);
			this.logger.debug("taapi_request_failed", { indicator, ...failure });
			throw new IndicatorFetchError(indicator, failure.message, failure.status, {
				cause: error,
			});
		}

		if (!isRecord(data)) {
			throw new IndicatorFetchError(indicator, "response body is not an object");
		}
		return data;
	}
}
