import { OHLC_DAYS, type OhlcDays } from "@cryptota/core";

export type ArgValue = string | boolean;

export interface ParsedArgs {
	command?: string;
	positionals: string[];
	flags: Record<string, ArgValue>;
}

/** Flags that never take a value, so a following symbol stays positional. */
const BOOLEAN_FLAGS = new Set([
	"dry-run",
	"store",
	"help",
	"compact",
	"json",
	"all",
]);

/**
 * `--key value`, `--key=value` and bare `--flag` forms. The first positional
 * is the command; the rest are its operands.
 */
export const parseCliArgs = (argv: string[]): ParsedArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			flags[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--") && !BOOLEAN_FLAGS.has(key)) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	const [command, ...operands] = positionals;
	return { command, positionals: operands, flags };
};

export const readStringFlag = (
	flags: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = flags[key];
	return typeof value === "string" ? value : undefined;
};

export const parseDaysFlag = (
	value: ArgValue | undefined,
	fallback: OhlcDays = 30
): OhlcDays => {
	if (value === undefined) {
		return fallback;
	}
	const days =
		typeof value === "string"
			? OHLC_DAYS.find((candidate) => candidate === Number(value))
			: undefined;
	if (days === undefined) {
		throw new RangeError(
			`Invalid --days ${String(value)}. Must be one of: ${OHLC_DAYS.join(", ")}`
		);
	}
	return days;
};

export const parseLimitFlag = (
	value: ArgValue | undefined,
	fallback: number
): number => {
	if (value === undefined) {
		return fallback;
	}
	const limit = typeof value === "string" ? Number(value) : Number.NaN;
	if (!Number.isInteger(limit) || limit < 1) {
		throw new RangeError(
			`Invalid --limit ${String(value)}. Must be a positive integer`
		);
	}
	return limit;
};
