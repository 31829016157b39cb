import { MINUTE_MS, createLogger, roundTo, systemClock } from "@scalp-signals/core";
import type {
	AnalyzedCandle,
	Clock,
	IndicatorWeights,
	ProtectiveLevels,
	ScoringConfig,
	SignalDirection,
} from "@scalp-signals/core";
import { validateSnapshot } from "@scalp-signals/indicators";

import { CooldownTracker } from "./cooldown";
import {
	calculatePositionSize,
	deriveProtectiveLevels,
	levelsAreOrdered,
} from "./protectiveLevels";
import { type ScoreBreakdown, scoreSnapshot } from "./scoring";

const logger = createLogger("strategy");

export type HoldReason =
	| "insufficient_candles"
	| "data_quality"
	| "below_min_confidence"
	| "no_edge"
	| "invalid_levels";

export type StrategyDecision =
	| {
			direction: "HOLD";
			confidence: number;
			reason: HoldReason;
			scores?: ScoreBreakdown;
	  }
	| {
			direction: SignalDirection;
			confidence: number;
			levels: ProtectiveLevels;
			scores: ScoreBreakdown;
	  };

export const DEFAULT_RISK_PER_TRADE = 0.02;

export interface ScoringStrategyDependencies {
	clock?: Clock;
	/** Capital fraction risked per trade when sizing; usually `risk.riskPerTrade`. */
	riskPerTrade?: number;
}

export interface StrategyDescription {
	name: string;
	minCandles: number;
	minConfidence: number;
	minVolumeRatio: number;
	minVolatility: number;
	rsiOversold: number;
	rsiOverbought: number;
	cooldownMinutes: number;
	stopLossMultiplier: number;
	takeProfitMultiplier: number;
	riskPerTrade: number;
	weights: IndicatorWeights;
}

export class ScoringStrategy {
	readonly name = "weighted_scalping";
	private readonly cooldown: CooldownTracker;
	private readonly riskPerTrade: number;

	constructor(
		private readonly config: ScoringConfig,
		deps: ScoringStrategyDependencies = {}
	) {
		this.riskPerTrade = deps.riskPerTrade ?? DEFAULT_RISK_PER_TRADE;
		this.cooldown = new CooldownTracker(
			config.signalCooldownMinutes,
			deps.clock ?? systemClock
		);
	}

	analyze(candles: readonly AnalyzedCandle[]): StrategyDecision {
		const latestCandle = candles[candles.length - 1];
		if (candles.length < this.config.minCandles || !latestCandle) {
			logger.warn("insufficient_candles", {
				symbol: latestCandle?.symbol,
				candles: candles.length,
				required: this.config.minCandles,
			});
			return this.hold("insufficient_candles", 0);
		}

		const snapshot = validateSnapshot(candles);
		if (!snapshot.ok) {
			logger.warn("data_quality_rejected", {
				symbol: latestCandle.symbol,
				missing: snapshot.missing,
			});
			return this.hold("data_quality", 0);
		}

		const scores = scoreSnapshot(snapshot.latest, snapshot.previous, this.config);
		const { buyScore, sellScore } = scores;
		const confidence = Math.max(buyScore, sellScore);

		logger.debug("strategy_context", {
			symbol: latestCandle.symbol,
			timestamp: new Date(latestCandle.timestamp).toISOString(),
			buyScore,
			sellScore,
			contributions: scores.contributions,
			skipped: scores.skipped,
		});

		if (confidence < this.config.minConfidence) {
			return this.hold("below_min_confidence", confidence, scores);
		}
		if (buyScore === sellScore) {
			return this.hold("no_edge", confidence, scores);
		}

		const direction: SignalDirection = buyScore > sellScore ? "BUY" : "SELL";
		const levels = deriveProtectiveLevels(
			direction,
			snapshot.latest.close,
			snapshot.latest.atr,
			this.config
		);
		if (!levelsAreOrdered(direction, levels)) {
			logger.warn("protective_levels_rejected", {
				symbol: latestCandle.symbol,
				direction,
				...levels,
			});
			return this.hold("invalid_levels", confidence, scores);
		}

		return { direction, confidence, levels, scores };
	}

	/**
	 * Emission gate keyed on symbol and direction. Scoring is unaffected; this
	 * only decides whether a fresh decision may become a signal.
	 */
	validateSignal(
		symbol: string,
		direction: SignalDirection,
		cooldownMinutes?: number
	): boolean {
		const result = this.cooldown.check(symbol, direction, cooldownMinutes);
		if (!result.allowed) {
			logger.info("signal_cooldown", {
				symbol,
				direction,
				remainingMinutes: roundTo(result.remainingMs / MINUTE_MS, 1),
			});
		}
		return result.allowed;
	}

	calculatePositionSize(
		capital: number,
		entryPrice: number,
		stopLoss: number,
		riskFraction = this.riskPerTrade
	): number {
		const quantity = calculatePositionSize(
			capital,
			entryPrice,
			stopLoss,
			riskFraction
		);
		if (quantity === null) {
			logger.warn("position_size_undefined", { entryPrice, stopLoss });
			return 0;
		}
		logger.debug("position_size", { capital, riskFraction, quantity });
		return quantity;
	}

	describe(): StrategyDescription {
		const { config } = this;
		return {
			name: this.name,
			minCandles: config.minCandles,
			minConfidence: config.minConfidence,
			minVolumeRatio: config.minVolumeRatio,
			minVolatility: config.minVolatility,
			rsiOversold: config.rsiOversold,
			rsiOverbought: config.rsiOverbought,
			cooldownMinutes: config.signalCooldownMinutes,
			stopLossMultiplier: config.stopLossMultiplier,
			takeProfitMultiplier: config.takeProfitMultiplier,
			riskPerTrade: this.riskPerTrade,
			weights: { ...config.weights },
		};
	}

	private hold(
		reason: HoldReason,
		confidence: number,
		scores?: ScoreBreakdown
	): StrategyDecision {
		return { direction: "HOLD", confidence, reason, scores };
	}
}
