import { MINUTE_MS } from "./constants";

/**
 * Pure time utilities. Every timestamp is UTC epoch milliseconds; ISO strings
 * only appear at serialization boundaries.
 */

/** Candle intervals the signal service accepts for analysis. */
export const SUPPORTED_TIMEFRAMES = [
	"1m",
	"3m",
	"5m",
	"15m",
	"30m",
	"1h",
	"2h",
	"4h",
	"6h",
	"12h",
	"1d",
] as const;

export type SupportedTimeframe = (typeof SUPPORTED_TIMEFRAMES)[number];

export const isSupportedTimeframe = (
	value: string
): value is SupportedTimeframe =>
	SUPPORTED_TIMEFRAMES.some((timeframe) => timeframe === value);

export const toIsoTimestamp = (ts: number): string => new Date(ts).toISOString();

/**
 * Parse an ISO-8601 string back to epoch milliseconds.
 * @returns null when the string is not a valid date
 */
export const parseIsoTimestamp = (value: string): number | null => {
	const ts = Date.parse(value);
	return Number.isFinite(ts) ? ts : null;
};

export const minutesBetween = (fromTs: number, toTs: number): number =>
	(toTs - fromTs) / MINUTE_MS;
