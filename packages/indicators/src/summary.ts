import type { AnalyzedCandle } from "@scalp-signals/core";

export type TrendLabel = "BULLISH" | "BEARISH" | "NEUTRAL";

/** Fast average must clear the slow one by this fraction to count as a trend. */
export const TREND_MARGIN = 0.01;

export interface MarketSummary {
	symbol: string;
	timestamp: number;
	price: number;
	trend: TrendLabel;
	volatility: number;
	indicators: {
		emaFast: number | null;
		emaSlow: number | null;
		rsi: number | null;
		bbUpper: number | null;
		bbLower: number | null;
		vwap: number | null;
		atr: number | null;
		volumeRatio: number | null;
	};
}

export const classifyTrend = (emaFast?: number, emaSlow?: number): TrendLabel => {
	if (emaFast === undefined || emaSlow === undefined) {
		return "NEUTRAL";
	}
	if (emaFast > emaSlow * (1 + TREND_MARGIN)) {
		return "BULLISH";
	}
	if (emaFast < emaSlow * (1 - TREND_MARGIN)) {
		return "BEARISH";
	}
	return "NEUTRAL";
};

/** Latest-candle overview for operators; null for an empty window. */
export const summarizeMarket = (
	symbol: string,
	candles: readonly AnalyzedCandle[]
): MarketSummary | null => {
	const latest = candles[candles.length - 1];
	if (!latest) {
		return null;
	}
	const { indicators } = latest;

	return {
		symbol,
		timestamp: latest.timestamp,
		price: latest.close,
		trend: classifyTrend(indicators.emaFast, indicators.emaSlow),
		volatility: indicators.bbWidth ?? 0,
		indicators: {
			emaFast: indicators.emaFast ?? null,
			emaSlow: indicators.emaSlow ?? null,
			rsi: indicators.rsi ?? null,
			bbUpper: indicators.bbUpper ?? null,
			bbLower: indicators.bbLower ?? null,
			vwap: indicators.vwap ?? null,
			atr: indicators.atr ?? null,
			volumeRatio: indicators.volumeRatio ?? null,
		},
	};
};
