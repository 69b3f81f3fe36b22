import axios, { type AxiosInstance } from "axios";

/** The slice of an axios instance the REST clients call. */
export type HttpClient = Pick<AxiosInstance, "get">;

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpFailure {
	message: string;
	status?: number;
}

export const describeHttpError = (error: unknown): HttpFailure => {
	if (axios.isAxiosError(error)) {
		const status = error.response?.status;
		return status === undefined
			? { message: error.message }
			: { message: error.message, status };
	}
	return { message: error instanceof Error ? error.message : String(error) };
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const readFiniteNumber = (value: unknown, fallback = 0): number =>
	typeof value === "number" && Number.isFinite(value) ? value : fallback;
