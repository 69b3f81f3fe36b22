#!/usr/bin/env node

import process from "node:process";
import {
	createLogger,
	isTechnicalAnalysisError,
	loadCryptoRegistry,
	loadEnvConfig,
} from "@cryptota/core";
import {
	CcxtMarketSource,
	CoinGeckoClient,
	TaapiIndicatorSource,
} from "@cryptota/data";
import { createRecordStore } from "@cryptota/persistence";
import { runCli, type CliContext } from "./commands";

const main = async (): Promise<void> => {
	const config = loadEnvConfig();
	const registry = loadCryptoRegistry();

	const ctx: CliContext = {
		config,
		registry,
		createPriceSource: (kind) =>
			kind === "exchange"
				? new CcxtMarketSource({ exchange: config.exchange, registry })
				: new CoinGeckoClient({
						apiKey: config.coingeckoApiKey,
						registry,
						logger: createLogger("coingecko"),
					}),
		createIndicatorSource: () =>
			new TaapiIndicatorSource({
				apiKey: config.taapiApiKey,
				logger: createLogger("taapi"),
			}),
		store: createRecordStore({
			driver: "file",
			filePath: config.storePath,
			logger: createLogger("record-store"),
		}),
		logger: createLogger("ta-cli"),
		write: (text) => {
			process.stdout.write(`${text}\n`);
		},
	};

	process.exitCode = await runCli(process.argv.slice(2), ctx);
};

main().catch((error: unknown) => {
	const code = isTechnicalAnalysisError(error) ? ` [${error.code}]` : "";
	console.error(
		`ta failed${code}:`,
		error instanceof Error ? error.message : String(error)
	);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
