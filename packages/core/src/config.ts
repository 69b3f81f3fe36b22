import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";

import { UnsupportedSymbolError } from "./errors";
import { normalizeInterval } from "./time";

export interface CryptoConfig {
	symbol: string;
	name: string;
	coingeckoId: string;
	slug: string;
}

export interface EnvConfig {
	taapiApiKey: string;
	coingeckoApiKey?: string;
	supportedCryptos: string[];
	exchange: string;
	interval: string;
	rateLimitDelayMs: number;
	maxRetries: number;
	retryDelayMs: number;
	symbolCooldownMs: number;
	storePath: string;
}

const WORKSPACE_ROOT = path.resolve(
	path.dirname(fileURLToPath(import.meta.url)),
	"..",
	"..",
	".."
);

const getDefaultEnvPath = (): string => path.join(WORKSPACE_ROOT, ".env");
export const getDefaultConfigDir = (): string =>
	path.join(WORKSPACE_ROOT, "config");

const DEFAULT_CRYPTOS = ["BTC", "ETH", "SOL"];

type EnvSource = Record<string, string | undefined>;

const readOptional = (env: EnvSource, key: string): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readNumber = (
	env: EnvSource,
	key: string,
	fallback: number,
	min = 0
): number => {
	const raw = readOptional(env, key);
	if (raw === undefined) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value < min) {
		throw new Error(
			`Environment variable ${key} must be a number >= ${min}, got "${raw}"`
		);
	}
	return value;
};

const parseSymbolList = (value?: string): string[] | undefined => {
	if (!value) {
		return undefined;
	}
	const symbols = value
		.split(",")
		.map((token) => token.trim().toUpperCase())
		.filter((token) => token.length > 0);
	return symbols.length ? symbols : undefined;
};

/**
 * Builds typed config from an environment map. Split from `loadEnvConfig`
 * so tests can pass a plain object.
 */
export const resolveEnvConfig = (env: EnvSource): EnvConfig => {
	const storePath = readOptional(env, "TA_STORE_PATH") ?? "data/records.jsonl";
	return {
		taapiApiKey: readOptional(env, "TAAPI_API_KEY") ?? "",
		coingeckoApiKey: readOptional(env, "COINGECKO_API_KEY"),
		supportedCryptos:
			parseSymbolList(readOptional(env, "SUPPORTED_CRYPTOS")) ??
			DEFAULT_CRYPTOS,
		exchange: (readOptional(env, "TA_EXCHANGE") ?? "binance").toLowerCase(),
		interval: normalizeInterval(readOptional(env, "TA_INTERVAL") ?? "1h"),
		rateLimitDelayMs: readNumber(env, "TA_RATE_LIMIT_DELAY_MS", 18_000),
		maxRetries: Math.floor(readNumber(env, "TA_MAX_RETRIES", 5)),
		retryDelayMs: readNumber(env, "TA_RETRY_DELAY_MS", 30_000),
		symbolCooldownMs: readNumber(env, "TA_SYMBOL_COOLDOWN_MS", 5_000),
		storePath: path.isAbsolute(storePath)
			? storePath
			: path.join(WORKSPACE_ROOT, storePath),
	};
};

let loadedEnvPath: string | undefined;

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (loadedEnvPath !== envPath && fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}
	return resolveEnvConfig(process.env);
};

const isCryptoConfig = (value: unknown): value is CryptoConfig => {
	if (!value || typeof value !== "object") {
		return false;
	}
	const entry: Record<string, unknown> = { ...value };
	return ["symbol", "name", "coingeckoId", "slug"].every(
		(key) => typeof entry[key] === "string" && entry[key] !== ""
	);
};

export class CryptoRegistry {
	private readonly bySymbol = new Map<string, CryptoConfig>();
	private readonly bySlug = new Map<string, CryptoConfig>();

	constructor(entries: CryptoConfig[]) {
		for (const entry of entries) {
			const normalized = { ...entry, symbol: entry.symbol.toUpperCase() };
			this.bySymbol.set(normalized.symbol, normalized);
			this.bySlug.set(normalized.slug.toLowerCase(), normalized);
		}
	}

	/** Lookup by symbol ("BTC") or URL slug ("bitcoin"), case-insensitive. */
	find(identifier: string): CryptoConfig | null {
		const trimmed = identifier.trim();
		return (
			this.bySymbol.get(trimmed.toUpperCase()) ??
			this.bySlug.get(trimmed.toLowerCase()) ??
			null
		);
	}

	/** @throws UnsupportedSymbolError */
	require(identifier: string): CryptoConfig {
		const config = this.find(identifier);
		if (!config) {
			throw new UnsupportedSymbolError(identifier);
		}
		return config;
	}

	/** Every registered symbol, in file order. */
	symbols(): string[] {
		return Array.from(this.bySymbol.keys());
	}
}

export const loadCryptoRegistry = (
	configDir = getDefaultConfigDir()
): CryptoRegistry => {
	const registryPath = path.join(configDir, "cryptos.json");
	const parsed: unknown = JSON.parse(fs.readFileSync(registryPath, "utf-8"));
	if (!Array.isArray(parsed)) {
		throw new Error(`${registryPath} must contain an array of cryptos`);
	}
	const entries = parsed.map((entry, index) => {
		if (!isCryptoConfig(entry)) {
			throw new Error(
				`${registryPath}[${index}] must define symbol, name, coingeckoId and slug`
			);
		}
		return entry;
	});
	return new CryptoRegistry(entries);
};
