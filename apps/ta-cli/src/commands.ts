import {
	RateLimiter,
	computeFromOhlc,
	fetchFromRemote,
	runBatch,
	serializeRecord,
} from "@cryptota/analysis";
import {
	describeError,
	systemClock,
	systemWallClock,
	type Clock,
	type CryptoRegistry,
	type EnvConfig,
	type IndicatorSource,
	type ModuleLogger,
	type OhlcDays,
	type PriceSource,
	type RecordStore,
	type TechnicalAnalysisRecord,
	type WallClock,
} from "@cryptota/core";
import { DEFAULT_LATEST_LIMIT } from "@cryptota/persistence";
import {
	parseCliArgs,
	parseDaysFlag,
	parseLimitFlag,
	readStringFlag,
	type ArgValue,
} from "./cliArgs";
import {
	checkFreshness,
	formatFreshness,
	isHealthy,
	type FreshnessReport,
} from "./freshness";

export const USAGE = `Usage:
  ta compute <SYMBOL> [--days N] [--source coingecko|exchange] [--store]
  ta fetch <SYMBOL> [--store]
  ta batch [SYMBOL...|--all] [--mode remote|local] [--days N] [--dry-run]
  ta latest [SYMBOL] [--limit N]
  ta freshness [SYMBOL|--all] [--json]

Options:
  --days <n>           OHLC window for local computation (1, 7, 14, 30, 90, 180, 365)
  --source <name>      Candle source for local computation (default coingecko)
  --mode <name>        Acquisition path for batch runs (default remote)
  --store              Persist the record to the configured store
  --dry-run            Compute without storing (batch)
  --all                Every registered symbol (batch, freshness)
  --limit <n>          Records to list, newest first (default 10)
  --json               Machine-readable freshness report
  --compact            Print single-line JSON
  --help               Show this message
`;

export type PriceSourceKind = "coingecko" | "exchange";

/** Everything the commands touch outside the process, injected for tests. */
export interface CliContext {
	config: EnvConfig;
	registry: CryptoRegistry;
	createPriceSource: (kind: PriceSourceKind) => PriceSource;
	/** Lazy so local commands run without an indicator API key. */
	createIndicatorSource: () => IndicatorSource;
	store: RecordStore;
	logger: ModuleLogger;
	write: (text: string) => void;
	clock?: Clock;
	now?: WallClock;
}

const parsePriceSourceKind = (value: string | undefined): PriceSourceKind => {
	if (value === undefined || value === "coingecko" || value === "exchange") {
		return value ?? "coingecko";
	}
	throw new Error(`Unknown --source ${value}. Expected coingecko or exchange`);
};

export const computeRecord = async (
	ctx: CliContext,
	symbol: string,
	days: OhlcDays,
	priceSource: PriceSource
): Promise<TechnicalAnalysisRecord> => {
	const crypto = ctx.registry.require(symbol);
	const candles = await priceSource.getOhlc(crypto.symbol, days);
	ctx.logger.info("ohlc_loaded", {
		symbol: crypto.symbol,
		days,
		candles: candles.length,
	});
	return computeFromOhlc(crypto.symbol, candles, {
		coingeckoId: crypto.coingeckoId,
		now: ctx.now ?? systemWallClock,
		logger: ctx.logger,
	});
};

export const fetchRecord = (
	ctx: CliContext,
	symbol: string,
	rateLimiter?: RateLimiter
): Promise<TechnicalAnalysisRecord> =>
	fetchFromRemote(symbol, {
		source: ctx.createIndicatorSource(),
		exchange: ctx.config.exchange,
		interval: ctx.config.interval,
		rateLimitDelayMs: ctx.config.rateLimitDelayMs,
		maxRetries: ctx.config.maxRetries,
		retryDelayMs: ctx.config.retryDelayMs,
		priceSource: ctx.createPriceSource("coingecko"),
		registry: ctx.registry,
		rateLimiter,
		clock: ctx.clock,
		now: ctx.now,
		logger: ctx.logger,
	});

const storeIfRequested = async (
	ctx: CliContext,
	flags: Record<string, ArgValue>,
	record: TechnicalAnalysisRecord
): Promise<void> => {
	if (!flags.store) {
		return;
	}
	try {
		const stored = await ctx.store.insert(record);
		ctx.logger.info(stored ? "record_stored" : "record_not_stored", {
			symbol: record.symbol,
		});
	} catch (error) {
		ctx.logger.error("record_persist_failed", {
			symbol: record.symbol,
			error: describeError(error),
		});
	}
};

const printRecord = (
	ctx: CliContext,
	flags: Record<string, ArgValue>,
	record: TechnicalAnalysisRecord
): void => {
	ctx.write(serializeRecord(record, flags.compact ? undefined : 2));
};

/** Registry symbol when known, so "bitcoin" and "BTC" read the same rows. */
const storedSymbol = (ctx: CliContext, identifier: string): string =>
	ctx.registry.find(identifier)?.symbol ?? identifier.trim().toUpperCase();

const requireSymbol = (positionals: string[], command: string): string => {
	const [symbol] = positionals;
	if (!symbol) {
		throw new Error(`${command} requires a symbol, e.g. "ta ${command} BTC"`);
	}
	return symbol;
};

/**
 * Dispatches one invocation. Resolves to the process exit code; fatal
 * acquisition errors reject.
 */
export const runCli = async (
	argv: string[],
	ctx: CliContext
): Promise<number> => {
	const { command, positionals, flags } = parseCliArgs(argv);

	if (flags.help || command === undefined || command === "help") {
		ctx.write(USAGE);
		return command === undefined && !flags.help ? 1 : 0;
	}

	switch (command) {
		case "compute": {
			const symbol = requireSymbol(positionals, command);
			const days = parseDaysFlag(flags.days);
			const source = ctx.createPriceSource(
				parsePriceSourceKind(readStringFlag(flags, "source"))
			);
			const record = await computeRecord(ctx, symbol, days, source);
			printRecord(ctx, flags, record);
			await storeIfRequested(ctx, flags, record);
			return 0;
		}
		case "fetch": {
			const record = await fetchRecord(ctx, requireSymbol(positionals, command));
			printRecord(ctx, flags, record);
			await storeIfRequested(ctx, flags, record);
			return 0;
		}
		case "batch": {
			const mode = readStringFlag(flags, "mode") ?? "remote";
			if (mode !== "remote" && mode !== "local") {
				throw new Error(`Unknown --mode ${mode}. Expected remote or local`);
			}
			const days = parseDaysFlag(flags.days);
			const symbols = flags.all
				? ctx.registry.symbols()
				: positionals.length
					? positionals.map((symbol) => symbol.toUpperCase())
					: ctx.config.supportedCryptos;
			const clock = ctx.clock ?? systemClock;
			// One throttle for the whole run: the quota is per API key.
			const rateLimiter = new RateLimiter({
				delayMs: ctx.config.rateLimitDelayMs,
				clock,
				logger: ctx.logger,
			});
			const priceSource =
				mode === "local"
					? ctx.createPriceSource(
							parsePriceSourceKind(readStringFlag(flags, "source"))
						)
					: undefined;

			const result = await runBatch(symbols, {
				acquire: (symbol) =>
					priceSource
						? computeRecord(ctx, symbol, days, priceSource)
						: fetchRecord(ctx, symbol, rateLimiter),
				store: ctx.store,
				cooldownMs: ctx.config.symbolCooldownMs,
				dryRun: Boolean(flags["dry-run"]),
				clock,
				logger: ctx.logger,
			});

			for (const outcome of result.outcomes) {
				const detail = [
					outcome.overall,
					outcome.successRatio === undefined
						? undefined
						: `${Math.round(outcome.successRatio * 100)}% fetched`,
					outcome.error,
				]
					.filter((part) => part !== undefined)
					.join(", ");
				ctx.write(`${outcome.symbol}: ${outcome.status}${detail ? ` (${detail})` : ""}`);
			}
			ctx.write(`Computed ${result.computed}/${symbols.length}, failed ${result.failed}`);
			return result.exitCode;
		}
		case "latest": {
			const [identifier] = positionals;
			const symbol =
				identifier === undefined ? undefined : storedSymbol(ctx, identifier);
			const records = await ctx.store.latest(
				symbol,
				parseLimitFlag(flags.limit, DEFAULT_LATEST_LIMIT)
			);
			if (!records.length) {
				ctx.write(symbol ? `No stored records for ${symbol}` : "No stored records");
				return 0;
			}
			for (const record of records) {
				printRecord(ctx, flags, record);
			}
			return 0;
		}
		case "freshness": {
			const now = ctx.now ?? systemWallClock;
			const [identifier = ctx.config.supportedCryptos[0] ?? "BTC"] = positionals;
			const symbols = flags.all
				? ctx.registry.symbols()
				: [storedSymbol(ctx, identifier)];
			const reports: FreshnessReport[] = [];
			for (const symbol of symbols) {
				reports.push(await checkFreshness(ctx.store, symbol, now));
			}
			if (flags.json) {
				const payload = flags.all
					? Object.fromEntries(reports.map((report) => [report.symbol, report]))
					: reports[0];
				ctx.write(JSON.stringify(payload, null, 2));
			} else {
				ctx.write(reports.map(formatFreshness).join("\n\n"));
			}
			return reports.every(isHealthy) ? 0 : 1;
		}
		default:
			ctx.write(`Unknown command "${command}"\n\n${USAGE}`);
			return 1;
	}
};
