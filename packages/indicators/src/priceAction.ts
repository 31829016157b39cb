import type { SparseSeries } from "./series";
import { rollingMean } from "./sma";

export const PRICE_CHANGE_MA_WINDOW = 5;
export const MOMENTUM_LOOKBACK = 4;

export interface PriceActionSeries {
	priceChange: number[];
	priceChangeMa: number[];
	momentum: number[];
}

export function priceActionSeries(closes: readonly number[]): PriceActionSeries {
	const changes: SparseSeries = closes.map((close, index) =>
		index === 0 ? null : (close - closes[index - 1]) / closes[index - 1]
	);
	const changeMa = rollingMean(changes, PRICE_CHANGE_MA_WINDOW, 1);

	return {
		priceChange: changes.map((value) => value ?? 0),
		priceChangeMa: changeMa.map((value) => value ?? 0),
		momentum: closes.map((close, index) =>
			index < MOMENTUM_LOOKBACK ? 0 : close - closes[index - MOMENTUM_LOOKBACK]
		),
	};
}
