import { type SparseSeries, emptySeries, mean } from "./series";

export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

/** True range per candle; the first candle has no previous close and uses high - low. */
export const trueRangeSeries = (candles: readonly AtrInput[]): number[] =>
	candles.map((current, index) => {
		const highLow = current.high - current.low;
		if (index === 0) {
			return highLow;
		}
		const previousClose = candles[index - 1].close;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		return Math.max(highLow, highClose, lowClose);
	});

/**
 * Wilder ATR aligned with `trueRanges`. Seeded at slot `period` with the mean
 * of the true ranges that have a previous close.
 */
export function atrSeries(trueRanges: readonly number[], period = 14): SparseSeries {
	if (period <= 0) {
		throw new Error("ATR period must be positive");
	}

	const series = emptySeries(trueRanges.length);
	if (trueRanges.length < period + 1) {
		return series;
	}

	let atr = mean(trueRanges.slice(1, period + 1));
	series[period] = atr;

	for (let i = period + 1; i < trueRanges.length; i += 1) {
		atr = (atr * (period - 1) + trueRanges[i]) / period;
		series[i] = atr;
	}

	return series;
}
