import { type SparseSeries, emptySeries, mean } from "./series";

/**
 * Exponential moving average seeded with the simple average of the first
 * `length` values. Slots before the seed are null.
 */
export function emaSeries(values: readonly number[], length: number): SparseSeries {
	if (length <= 0) {
		throw new Error("EMA length must be positive");
	}

	const series = emptySeries(values.length);
	if (values.length < length) {
		return series;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = mean(values.slice(0, length));
	series[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}
