/** Indicator column with `null` where the look-back window is not yet full. */
export type SparseSeries = (number | null)[];

export const isDefined = (value: number | null): value is number =>
	value !== null;

export const emptySeries = (length: number): SparseSeries =>
	Array.from({ length }, () => null);

export const mean = (values: readonly number[]): number =>
	values.reduce((acc, value) => acc + value, 0) / values.length;

/**
 * Replaces missing values with the nearest earlier value; leading gaps take
 * `fallback` when given, otherwise the first defined value.
 * @returns null when the series has no defined value and no fallback
 */
export const fillLeading = (
	series: SparseSeries,
	fallback?: number
): number[] | null => {
	const first = fallback ?? series.find(isDefined);
	if (first === undefined) {
		return null;
	}
	let last = first;
	return series.map((value) => {
		if (value === null) {
			return last;
		}
		last = value;
		return value;
	});
};
