import { type SparseSeries, emptySeries } from "./series";

export const RSI_NEUTRAL = 50;

const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return avgGain === 0 ? RSI_NEUTRAL : 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Wilder RSI aligned with `values`; the first `period` slots are null.
 */
export function rsiSeries(values: readonly number[], period = 14): SparseSeries {
	if (period <= 0) {
		throw new Error("RSI period must be positive");
	}

	const rsis = emptySeries(values.length);
	if (values.length <= period) {
		return rsis;
	}

	let gains = 0;
	let losses = 0;

	for (let i = 1; i <= period; i += 1) {
		const change = values[i] - values[i - 1];
		if (change >= 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}

	let avgGain = gains / period;
	let avgLoss = losses / period;
	rsis[period] = toRsi(avgGain, avgLoss);

	for (let i = period + 1; i < values.length; i += 1) {
		const change = values[i] - values[i - 1];
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);
		avgGain = (avgGain * (period - 1) + gain) / period;
		avgLoss = (avgLoss * (period - 1) + loss) / period;
		rsis[i] = toRsi(avgGain, avgLoss);
	}

	return rsis;
}
