import { roundTo } from "@scalp-signals/core";
import type {
	ProtectiveLevels,
	ScoringConfig,
	SignalDirection,
} from "@scalp-signals/core";

const RATIO_PRECISION = 2;

/**
 * ATR-scaled stop and target around the entry price. Prices are rounded to
 * `pricePrecision`; ATR and the reward/risk ratio to two decimals.
 */
export const deriveProtectiveLevels = (
	direction: SignalDirection,
	entryPrice: number,
	atr: number,
	config: Pick<
		ScoringConfig,
		"stopLossMultiplier" | "takeProfitMultiplier" | "pricePrecision"
	>
): ProtectiveLevels => {
	const stopDistance = atr * config.stopLossMultiplier;
	const profitDistance = atr * config.takeProfitMultiplier;
	const sign = direction === "BUY" ? 1 : -1;

	const stopLoss = entryPrice - sign * stopDistance;
	const takeProfit = entryPrice + sign * profitDistance;
	const risk = Math.abs(entryPrice - stopLoss);
	const reward = Math.abs(takeProfit - entryPrice);

	return {
		entryPrice: roundTo(entryPrice, config.pricePrecision),
		stopLoss: roundTo(stopLoss, config.pricePrecision),
		takeProfit: roundTo(takeProfit, config.pricePrecision),
		atr: roundTo(atr, RATIO_PRECISION),
		riskRewardRatio: roundTo(risk > 0 ? reward / risk : 0, RATIO_PRECISION),
	};
};

/** BUY: stop < entry < target. SELL: target < entry < stop. */
export const levelsAreOrdered = (
	direction: SignalDirection,
	levels: Pick<ProtectiveLevels, "entryPrice" | "stopLoss" | "takeProfit">
): boolean =>
	direction === "BUY"
		? levels.stopLoss < levels.entryPrice && levels.entryPrice < levels.takeProfit
		: levels.takeProfit < levels.entryPrice && levels.entryPrice < levels.stopLoss;

/**
 * Informational position size: units such that hitting the stop loses
 * `riskFraction` of `capital`. Returns 0 when entry equals stop.
 */
export const calculatePositionSize = (
	capital: number,
	entryPrice: number,
	stopLoss: number,
	riskFraction = 0.02
): number | null => {
	const priceDifference = Math.abs(entryPrice - stopLoss);
	if (priceDifference === 0) {
		return null;
	}
	return roundTo((capital * riskFraction) / priceDifference, 3);
};
