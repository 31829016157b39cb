import type { SparseSeries } from "./series";
import { rollingMean, rollingStdDev } from "./sma";

export interface BollingerSeries {
	upper: SparseSeries;
	middle: SparseSeries;
	lower: SparseSeries;
}

export function bollingerSeries(
	closes: readonly number[],
	period = 20,
	stdDevs = 2
): BollingerSeries {
	const middle = rollingMean(closes, period);
	const deviation = rollingStdDev(closes, period);

	const band = (sign: 1 | -1): SparseSeries =>
		middle.map((mid, index) => {
			const dev = deviation[index];
			return mid === null || dev === null ? null : mid + sign * stdDevs * dev;
		});

	return { upper: band(1), middle, lower: band(-1) };
}

/** Normalized band width; 0 when the middle band is 0. */
export const bandWidth = (upper: number, lower: number, middle: number): number =>
	middle === 0 ? 0 : (upper - lower) / middle;
