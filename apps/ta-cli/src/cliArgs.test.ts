import { describe, expect, it } from "vitest";
import {
	parseCliArgs,
	parseDaysFlag,
	parseLimitFlag,
	readStringFlag,
} from "./cliArgs";

describe("ta CLI arg parsing", () => {
	it("splits the command from its operands", () => {
		const args = parseCliArgs(["compute", "btc", "--days", "90"]);

		expect(args.command).toBe("compute");
		expect(args.positionals).toEqual(["btc"]);
		expect(args.flags.days).toBe("90");
	});

	it("captures flags with equals syntax", () => {
		const args = parseCliArgs(["fetch", "ETH", "--source=exchange"]);

		expect(readStringFlag(args.flags, "source")).toBe("exchange");
	});

	it("keeps symbols after boolean flags positional", () => {
		const args = parseCliArgs(["batch", "--dry-run", "BTC", "SOL"]);

		expect(args.flags["dry-run"]).toBe(true);
		expect(args.positionals).toEqual(["BTC", "SOL"]);
	});

	it("never lets --all or --json swallow a symbol", () => {
		const args = parseCliArgs(["freshness", "--json", "ETH"]);

		expect(args.flags.json).toBe(true);
		expect(args.positionals).toEqual(["ETH"]);
	});

	it("treats a trailing flag without value as boolean", () => {
		expect(parseCliArgs(["compute", "BTC", "--json"]).flags.json).toBe(true);
	});
});

describe("parseDaysFlag", () => {
	it("accepts the supported windows only", () => {
		expect(parseDaysFlag(undefined)).toBe(30);
		expect(parseDaysFlag("365")).toBe(365);
		expect(() => parseDaysFlag("5")).toThrow(
			"Invalid --days 5. Must be one of: 1, 7, 14, 30, 90, 180, 365"
		);
		expect(() => parseDaysFlag(true)).toThrow(RangeError);
	});
});

describe("parseLimitFlag", () => {
	it("accepts positive integers and falls back when absent", () => {
		expect(parseLimitFlag(undefined, 10)).toBe(10);
		expect(parseLimitFlag("3", 10)).toBe(3);
	});

	it("rejects zero, fractions and bare flags", () => {
		expect(() => parseLimitFlag("0", 10)).toThrow(
			"Invalid --limit 0. Must be a positive integer"
		);
		expect(() => parseLimitFlag("2.5", 10)).toThrow(RangeError);
		expect(() => parseLimitFlag(true, 10)).toThrow("Invalid --limit true");
	});
});
