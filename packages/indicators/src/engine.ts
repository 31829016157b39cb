import {
	CANDLE_FIELDS,
	EmptyCandleSeriesError,
	MissingFieldError,
	createLogger,
	describeError,
} from "@scalp-signals/core";
import type {
	AnalyzedCandle,
	Candle,
	CandleField,
	IndicatorConfig,
	IndicatorField,
	IndicatorSnapshot,
} from "@scalp-signals/core";

import { atrSeries, trueRangeSeries } from "./atr";
import { bandWidth, bollingerSeries } from "./bollinger";
import { emaSeries } from "./ema";
import { priceActionSeries } from "./priceAction";
import { RSI_NEUTRAL, rsiSeries } from "./rsi";
import { type SparseSeries, fillLeading } from "./series";
import { volumeSeries } from "./volume";
import { vwapSeries } from "./vwap";

const logger = createLogger("indicators");

export const INDICATOR_FAMILIES = [
	"trend",
	"momentum",
	"bands",
	"vwap",
	"volume",
	"volatility",
	"priceAction",
] as const;

export type IndicatorFamily = (typeof INDICATOR_FAMILIES)[number];

export type IndicatorResult<T> =
	| { ok: true; value: T }
	| { ok: false; reason: string };

/** One computed column, aligned index-for-index with the candle window. */
export type IndicatorColumn = readonly [IndicatorField, number[]];

export interface FamilyFailure {
	family: IndicatorFamily;
	reason: string;
}

export interface IndicatorComputation {
	candles: AnalyzedCandle[];
	failures: FamilyFailure[];
}

const isPresent = (value: unknown): value is number =>
	typeof value === "number" && !Number.isNaN(value);

const toCandle = (raw: Partial<Candle>): Candle | null => {
	const { timestamp, open, high, low, close, volume } = raw;
	if (
		!isPresent(timestamp) ||
		!isPresent(open) ||
		!isPresent(high) ||
		!isPresent(low) ||
		!isPresent(close) ||
		!isPresent(volume)
	) {
		return null;
	}
	return { ...raw, timestamp, open, high, low, close, volume };
};

const normalizeCandles = (candles: readonly Partial<Candle>[]): Candle[] => {
	if (!candles.length) {
		throw new EmptyCandleSeriesError();
	}

	const missing = new Set<CandleField>();
	let firstIndex: number | undefined;
	const normalized: Candle[] = [];

	candles.forEach((raw, index) => {
		const candle = toCandle(raw);
		if (candle) {
			normalized.push(candle);
			return;
		}
		for (const field of CANDLE_FIELDS) {
			if (!isPresent(raw[field])) {
				missing.add(field);
			}
		}
		if (firstIndex === undefined) {
			firstIndex = index;
		}
	});

	if (missing.size) {
		throw new MissingFieldError(
			CANDLE_FIELDS.filter((field) => missing.has(field)),
			firstIndex
		);
	}
	return normalized;
};

const requireSeries = (
	series: SparseSeries,
	label: string,
	needed: number
): number[] => {
	const values = fillLeading(series);
	if (!values) {
		throw new Error(`${label} needs at least ${needed} candles`);
	}
	return values;
};

const computeFamily = (
	family: IndicatorFamily,
	compute: () => IndicatorColumn[]
): IndicatorResult<IndicatorColumn[]> => {
	try {
		return { ok: true, value: compute() };
	} catch (error) {
		const reason = describeError(error);
		logger.warn("indicator_family_failed", { family, reason });
		return { ok: false, reason };
	}
};

const buildFamilies = (
	candles: Candle[],
	config: IndicatorConfig
): Record<IndicatorFamily, () => IndicatorColumn[]> => {
	const closes = candles.map((candle) => candle.close);

	return {
		trend: () => [
			[
				"emaFast",
				requireSeries(emaSeries(closes, config.emaFast), "emaFast", config.emaFast),
			],
			[
				"emaSlow",
				requireSeries(emaSeries(closes, config.emaSlow), "emaSlow", config.emaSlow),
			],
		],
		momentum: () => {
			const rsi = fillLeading(rsiSeries(closes, config.rsiPeriod), RSI_NEUTRAL);
			if (!rsi) {
				throw new Error("rsi could not be computed");
			}
			return [["rsi", rsi]];
		},
		bands: () => {
			const bands = bollingerSeries(
				closes,
				config.bollingerPeriod,
				config.bollingerStd
			);
			const needed = config.bollingerPeriod;
			const upper = requireSeries(bands.upper, "bbUpper", needed);
			const middle = requireSeries(bands.middle, "bbMiddle", needed);
			const lower = requireSeries(bands.lower, "bbLower", needed);
			const width = middle.map((mid, index) =>
				bandWidth(upper[index], lower[index], mid)
			);
			return [
				["bbUpper", upper],
				["bbMiddle", middle],
				["bbLower", lower],
				["bbWidth", width],
			];
		},
		vwap: () => [["vwap", vwapSeries(candles)]],
		volume: () => {
			const { volumeMa, volumeRatio } = volumeSeries(
				candles.map((candle) => candle.volume)
			);
			return [
				["volumeMa", volumeMa],
				["volumeRatio", volumeRatio],
			];
		},
		volatility: () => {
			const trueRange = trueRangeSeries(candles);
			const atr = requireSeries(
				atrSeries(trueRange, config.atrPeriod),
				"atr",
				config.atrPeriod + 1
			);
			return [
				["trueRange", trueRange],
				["atr", atr],
			];
		},
		priceAction: () => {
			const { priceChange, priceChangeMa, momentum } = priceActionSeries(closes);
			return [
				["priceChange", priceChange],
				["priceChangeMa", priceChangeMa],
				["momentum", momentum],
			];
		},
	};
};

/**
 * Turns an ordered candle window into candles carrying their indicator
 * snapshot. A family that fails is left out of every snapshot and reported in
 * `failures`; the others are unaffected.
 * @throws EmptyCandleSeriesError when no candles are given
 * @throws MissingFieldError when any candle lacks an OHLCV field
 */
export const computeIndicators = (
	candles: readonly Partial<Candle>[],
	config: IndicatorConfig
): IndicatorComputation => {
	const normalized = normalizeCandles(candles);
	const builders = buildFamilies(normalized, config);
	const columns: IndicatorColumn[] = [];
	const failures: FamilyFailure[] = [];

	for (const family of INDICATOR_FAMILIES) {
		const result = computeFamily(family, builders[family]);
		if (result.ok) {
			columns.push(...result.value);
		} else {
			failures.push({ family, reason: result.reason });
		}
	}

	const analyzed = normalized.map((candle, index): AnalyzedCandle => {
		const indicators: Partial<IndicatorSnapshot> = {};
		for (const [field, values] of columns) {
			indicators[field] = values[index];
		}
		return { ...candle, indicators };
	});

	logger.debug("indicators_computed", {
		candles: analyzed.length,
		failedFamilies: failures.map((failure) => failure.family),
	});

	return { candles: analyzed, failures };
};
