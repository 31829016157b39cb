import type { AnalyzedCandle, IndicatorSnapshot } from "@scalp-signals/core";

export const REQUIRED_LATEST_FIELDS = [
	"emaFast",
	"emaSlow",
	"rsi",
	"bbUpper",
	"bbMiddle",
	"bbLower",
	"bbWidth",
	"vwap",
	"volumeRatio",
	"atr",
	"priceChange",
] as const satisfies readonly (keyof IndicatorSnapshot)[];

export const REQUIRED_PREVIOUS_FIELDS = [
	"emaFast",
	"emaSlow",
	"vwap",
] as const satisfies readonly (keyof IndicatorSnapshot)[];

export type LatestSnapshot = Pick<
	IndicatorSnapshot,
	(typeof REQUIRED_LATEST_FIELDS)[number]
> & { close: number };

export type PreviousSnapshot = Pick<
	IndicatorSnapshot,
	(typeof REQUIRED_PREVIOUS_FIELDS)[number]
> & { close: number };

export type SnapshotCheck =
	| { ok: true; latest: LatestSnapshot; previous: PreviousSnapshot }
	| { ok: false; missing: string[] };

const orNaN = (value: number | undefined): number => value ?? Number.NaN;

/**
 * Data-quality gate run before scoring: the last two snapshots must carry
 * finite values for every field the scoring rules read.
 */
export const validateSnapshot = (
	candles: readonly AnalyzedCandle[]
): SnapshotCheck => {
	if (candles.length < 2) {
		return { ok: false, missing: ["previous"] };
	}

	const last = candles[candles.length - 1];
	const prev = candles[candles.length - 2];
	const { indicators: now } = last;
	const { indicators: before } = prev;

	const latest: LatestSnapshot = {
		close: last.close,
		emaFast: orNaN(now.emaFast),
		emaSlow: orNaN(now.emaSlow),
		rsi: orNaN(now.rsi),
		bbUpper: orNaN(now.bbUpper),
		bbMiddle: orNaN(now.bbMiddle),
		bbLower: orNaN(now.bbLower),
		bbWidth: orNaN(now.bbWidth),
		vwap: orNaN(now.vwap),
		volumeRatio: orNaN(now.volumeRatio),
		atr: orNaN(now.atr),
		priceChange: orNaN(now.priceChange),
	};
	const previous: PreviousSnapshot = {
		close: prev.close,
		emaFast: orNaN(before.emaFast),
		emaSlow: orNaN(before.emaSlow),
		vwap: orNaN(before.vwap),
	};

	const missing = [
		...REQUIRED_LATEST_FIELDS.filter((field) => !Number.isFinite(latest[field])).map(
			(field) => `latest.${field}`
		),
		...REQUIRED_PREVIOUS_FIELDS.filter(
			(field) => !Number.isFinite(previous[field])
		).map((field) => `previous.${field}`),
	];

	return missing.length ? { ok: false, missing } : { ok: true, latest, previous };
};
