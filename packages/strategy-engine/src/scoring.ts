import type { IndicatorWeights, ScoringConfig } from "@scalp-signals/core";
import type { LatestSnapshot, PreviousSnapshot } from "@scalp-signals/indicators";

/** Added to the side whose fast average crossed the slow one on this candle. */
export const CROSSOVER_BONUS = 0.05;
/** RSI strictly inside this band contributes nothing. */
export const RSI_NEUTRAL_BAND: readonly [number, number] = [40, 60];
export const RSI_MIDPOINT = 50;
export const VWAP_DEVIATION = 0.001;
export const PRICE_ACTION_THRESHOLD = 0.002;
export const HALF_WEIGHT = 0.5;

export type ScoreSide = "buy" | "sell";

export interface ScoreContribution {
	component: keyof IndicatorWeights | "crossover";
	side: ScoreSide;
	points: number;
	reason: string;
}

export interface ScoreBreakdown {
	buyScore: number;
	sellScore: number;
	contributions: ScoreContribution[];
	skipped: string[];
}

class ScoreCard {
	buyScore = 0;
	sellScore = 0;
	readonly contributions: ScoreContribution[] = [];
	readonly skipped: string[] = [];

	add(contribution: ScoreContribution): void {
		if (contribution.side === "buy") {
			this.buyScore += contribution.points;
		} else {
			this.sellScore += contribution.points;
		}
		this.contributions.push(contribution);
	}

	toBreakdown(): ScoreBreakdown {
		return {
			buyScore: this.buyScore,
			sellScore: this.sellScore,
			contributions: this.contributions,
			skipped: this.skipped,
		};
	}
}

const scoreTrend = (
	card: ScoreCard,
	latest: LatestSnapshot,
	previous: PreviousSnapshot,
	weight: number
): void => {
	if (latest.emaFast > latest.emaSlow) {
		card.add({ component: "trend", side: "buy", points: weight, reason: "fast_above_slow" });
		if (previous.emaFast <= previous.emaSlow) {
			card.add({
				component: "crossover",
				side: "buy",
				points: CROSSOVER_BONUS,
				reason: "golden_cross",
			});
		}
	} else if (latest.emaFast < latest.emaSlow) {
		card.add({ component: "trend", side: "sell", points: weight, reason: "fast_below_slow" });
		if (previous.emaFast >= previous.emaSlow) {
			card.add({
				component: "crossover",
				side: "sell",
				points: CROSSOVER_BONUS,
				reason: "death_cross",
			});
		}
	}
};

const scoreMomentum = (
	card: ScoreCard,
	rsi: number,
	config: ScoringConfig
): void => {
	const weight = config.weights.momentum;
	const [neutralLow, neutralHigh] = RSI_NEUTRAL_BAND;
	if (rsi < config.rsiOversold) {
		card.add({ component: "momentum", side: "buy", points: weight, reason: "rsi_oversold" });
	} else if (rsi > config.rsiOverbought) {
		card.add({ component: "momentum", side: "sell", points: weight, reason: "rsi_overbought" });
	} else if (rsi > neutralLow && rsi < neutralHigh) {
		return;
	} else if (rsi < RSI_MIDPOINT) {
		card.add({
			component: "momentum",
			side: "buy",
			points: weight * HALF_WEIGHT,
			reason: "rsi_leaning_oversold",
		});
	} else {
		card.add({
			component: "momentum",
			side: "sell",
			points: weight * HALF_WEIGHT,
			reason: "rsi_leaning_overbought",
		});
	}
};

const scoreBands = (
	card: ScoreCard,
	latest: LatestSnapshot,
	config: ScoringConfig
): void => {
	if (!(latest.bbWidth > config.minVolatility)) {
		card.skipped.push("bollinger");
		return;
	}
	const weight = config.weights.bollinger;
	if (latest.close <= latest.bbLower) {
		card.add({ component: "bollinger", side: "buy", points: weight, reason: "at_lower_band" });
	} else if (latest.close >= latest.bbUpper) {
		card.add({ component: "bollinger", side: "sell", points: weight, reason: "at_upper_band" });
	}
};

const scoreVwap = (
	card: ScoreCard,
	latest: LatestSnapshot,
	previous: PreviousSnapshot,
	weight: number
): void => {
	const { close, vwap } = latest;
	if (close > vwap && previous.close <= previous.vwap) {
		card.add({ component: "vwap", side: "buy", points: weight, reason: "vwap_cross_up" });
	} else if (close < vwap && previous.close >= previous.vwap) {
		card.add({ component: "vwap", side: "sell", points: weight, reason: "vwap_cross_down" });
	} else if (close > vwap * (1 + VWAP_DEVIATION)) {
		card.add({
			component: "vwap",
			side: "buy",
			points: weight * HALF_WEIGHT,
			reason: "above_vwap",
		});
	} else if (close < vwap * (1 - VWAP_DEVIATION)) {
		card.add({
			component: "vwap",
			side: "sell",
			points: weight * HALF_WEIGHT,
			reason: "below_vwap",
		});
	}
};

const scoreVolume = (
	card: ScoreCard,
	volumeRatio: number,
	config: ScoringConfig
): void => {
	if (!(volumeRatio > config.minVolumeRatio)) {
		return;
	}
	const weight = config.weights.volume;
	if (card.buyScore > card.sellScore) {
		card.add({ component: "volume", side: "buy", points: weight, reason: "volume_confirms" });
	} else if (card.sellScore > card.buyScore) {
		card.add({ component: "volume", side: "sell", points: weight, reason: "volume_confirms" });
	}
};

const scorePriceAction = (
	card: ScoreCard,
	priceChange: number,
	weight: number
): void => {
	if (priceChange > PRICE_ACTION_THRESHOLD) {
		card.add({ component: "priceAction", side: "buy", points: weight, reason: "impulse_up" });
	} else if (priceChange < -PRICE_ACTION_THRESHOLD) {
		card.add({ component: "priceAction", side: "sell", points: weight, reason: "impulse_down" });
	}
};

/**
 * Weighted buy/sell accumulation over the latest and previous snapshots.
 * Volume runs after trend, momentum, bands and VWAP so it can only reinforce
 * an existing lead.
 */
export const scoreSnapshot = (
	latest: LatestSnapshot,
	previous: PreviousSnapshot,
	config: ScoringConfig
): ScoreBreakdown => {
	const card = new ScoreCard();
	const { weights } = config;

	scoreTrend(card, latest, previous, weights.trend);
	scoreMomentum(card, latest.rsi, config);
	scoreBands(card, latest, config);
	scoreVwap(card, latest, previous, weights.vwap);
	scoreVolume(card, latest.volumeRatio, config);
	scorePriceAction(card, latest.priceChange, weights.priceAction);

	return card.toBreakdown();
};
