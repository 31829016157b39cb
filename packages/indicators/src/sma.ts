import { type SparseSeries, isDefined, mean } from "./series";

/**
 * Trailing mean over `window` entries. Missing entries are skipped; a slot is
 * null until it holds at least `minSamples` values.
 */
export function rollingMean(
	values: readonly (number | null)[],
	window: number,
	minSamples = window
): SparseSeries {
	if (window <= 0) {
		throw new Error("Rolling window must be positive");
	}

	return values.map((_, index) => {
		const samples = values
			.slice(Math.max(0, index - window + 1), index + 1)
			.filter(isDefined);
		return samples.length >= Math.max(1, minSamples) ? mean(samples) : null;
	});
}

/** Trailing population standard deviation over full windows only. */
export function rollingStdDev(
	values: readonly number[],
	window: number
): SparseSeries {
	if (window <= 0) {
		throw new Error("Rolling window must be positive");
	}

	return values.map((_, index) => {
		if (index < window - 1) {
			return null;
		}
		const samples = values.slice(index - window + 1, index + 1);
		const avg = mean(samples);
		const variance = mean(samples.map((value) => (value - avg) ** 2));
		return Math.sqrt(variance);
	});
}
