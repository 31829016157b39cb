export interface VwapCandle {
	high: number;
	low: number;
	close: number;
	volume: number;
}

export const typicalPrice = (candle: VwapCandle): number =>
	(candle.high + candle.low + candle.close) / 3;

/**
 * Running VWAP over the whole window. While no volume has traded yet the
 * candle's typical price stands in.
 */
export function vwapSeries(candles: readonly VwapCandle[]): number[] {
	let pvSum = 0;
	let volumeSum = 0;

	return candles.map((candle) => {
		const price = typicalPrice(candle);
		pvSum += price * candle.volume;
		volumeSum += candle.volume;
		return volumeSum > 0 ? pvSum / volumeSum : price;
	});
}
