import type { OHLCV } from "ccxt";
import type { Candle } from "@scalp-signals/core";

/**
 * Maps one ccxt OHLCV row to a Candle. Missing cells become NaN so that the
 * indicator engine reports them as absent fields instead of zero prices.
 */
export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: Number(timestamp ?? Number.NaN),
		open: Number(open ?? Number.NaN),
		high: Number(high ?? Number.NaN),
		low: Number(low ?? Number.NaN),
		close: Number(close ?? Number.NaN),
		volume: Number(volume ?? Number.NaN),
	};
};
