import { describe, expect, it } from "vitest";
import { DEFAULT_SIGNAL_CONFIG, MINUTE_MS } from "@scalp-signals/core";
import type {
	AnalyzedCandle,
	IndicatorSnapshot,
	ScoringConfig,
} from "@scalp-signals/core";
import { ScoringStrategy } from "./ScoringStrategy";

const scoring = DEFAULT_SIGNAL_CONFIG.scoring;

const neutral: IndicatorSnapshot = {
	emaFast: 100,
	emaSlow: 100,
	rsi: 50,
	bbUpper: 102,
	bbMiddle: 100,
	bbLower: 98,
	bbWidth: 0.01,
	vwap: 100,
	volumeMa: 100,
	volumeRatio: 1,
	trueRange: 1,
	atr: 0.5,
	priceChange: 0,
	priceChangeMa: 0,
	momentum: 0,
};

interface CandleOverride {
	close: number;
	indicators: Partial<IndicatorSnapshot>;
}

/** Ascending closes ending at the two overridden candles. */
const buildWindow = (
	count: number,
	previous: CandleOverride,
	latest: CandleOverride
): AnalyzedCandle[] =>
	Array.from({ length: count }, (_, i): AnalyzedCandle => {
		const override =
			i === count - 1 ? latest : i === count - 2 ? previous : undefined;
		const close = override?.close ?? previous.close - (count - 2 - i);
		return {
			symbol: "BTCUSDT",
			timestamp: i * MINUTE_MS,
			open: close,
			high: close + 1,
			low: close - 1,
			close,
			volume: 100,
			indicators: { ...neutral, ...(override?.indicators ?? {}) },
		};
	});

const bullishPrevious: CandleOverride = {
	close: 100,
	indicators: { emaFast: 100, emaSlow: 100.2, vwap: 100.5 },
};

const bullishLatest: CandleOverride = {
	close: 101,
	indicators: {
		emaFast: 101,
		emaSlow: 100.5,
		rsi: 25,
		vwap: 100.9,
		volumeRatio: 2,
		priceChange: 0.01,
		atr: 0.5,
	},
};

const withLatest = (
	indicators: Partial<IndicatorSnapshot>
): CandleOverride => ({
	close: bullishLatest.close,
	indicators: { ...bullishLatest.indicators, ...indicators },
});

describe("ScoringStrategy.analyze", () => {
	it("emits BUY on a fresh cross with oversold RSI and heavy volume", () => {
		const strategy = new ScoringStrategy(scoring);
		const decision = strategy.analyze(
			buildWindow(60, bullishPrevious, bullishLatest)
		);

		expect(decision.direction).toBe("BUY");
		if (decision.direction === "HOLD") {
			return;
		}
		const { trend, momentum, volume } = scoring.weights;
		expect(decision.confidence).toBeGreaterThanOrEqual(trend + momentum + volume);
		expect(decision.confidence).toBeCloseTo(0.9, 10);
		expect(decision.scores.sellScore).toBe(0);
		expect(decision.scores.skipped).toEqual(["bollinger"]);
		expect(
			decision.scores.contributions.map((entry) => entry.component)
		).toEqual(["trend", "crossover", "momentum", "vwap", "volume", "priceAction"]);
		expect(decision.levels).toEqual({
			entryPrice: 101,
			stopLoss: 100,
			takeProfit: 102.5,
			atr: 0.5,
			riskRewardRatio: 1.5,
		});
		expect(decision.levels.stopLoss).toBeLessThan(decision.levels.entryPrice);
		expect(decision.levels.entryPrice).toBeLessThan(decision.levels.takeProfit);
	});

	it("emits SELL with the target below entry and the stop above", () => {
		const strategy = new ScoringStrategy(scoring);
		const decision = strategy.analyze(
			buildWindow(
				60,
				{ close: 100, indicators: { emaFast: 100.5, emaSlow: 100.2, vwap: 99.5 } },
				{
					close: 98,
					indicators: {
						emaFast: 99,
						emaSlow: 100,
						rsi: 75,
						bbWidth: 0.05,
						bbUpper: 103,
						bbLower: 97,
						vwap: 99,
						priceChange: -0.005,
						atr: 1.234,
					},
				}
			)
		);

		expect(decision.direction).toBe("SELL");
		if (decision.direction === "HOLD") {
			return;
		}
		expect(decision.confidence).toBeCloseTo(0.75, 10);
		expect(decision.scores.buyScore).toBe(0);
		expect(decision.levels).toEqual({
			entryPrice: 98,
			stopLoss: 100.47,
			takeProfit: 94.3,
			atr: 1.23,
			riskRewardRatio: 1.5,
		});
	});

	it("holds on an exact tie whatever the confidence", () => {
		const tieConfig: ScoringConfig = {
			...scoring,
			minConfidence: 0.2,
			weights: {
				trend: 0.25,
				momentum: 0.25,
				bollinger: 0.15,
				vwap: 0.15,
				volume: 0.1,
				priceAction: 0.1,
			},
		};
		const strategy = new ScoringStrategy(tieConfig);
		const decision = strategy.analyze(
			buildWindow(
				60,
				{ close: 100, indicators: { emaFast: 101, emaSlow: 100 } },
				{
					close: 100,
					indicators: { emaFast: 101, emaSlow: 100, rsi: 80, volumeRatio: 3 },
				}
			)
		);

		expect(decision).toMatchObject({
			direction: "HOLD",
			reason: "no_edge",
			confidence: 0.25,
		});
		expect(decision.scores?.buyScore).toBe(0.25);
		expect(decision.scores?.sellScore).toBe(0.25);
	});

	it("holds below the minimum confidence", () => {
		const strategy = new ScoringStrategy(scoring);
		const decision = strategy.analyze(
			buildWindow(60, { close: 100, indicators: {} }, { close: 100, indicators: {} })
		);
		expect(decision).toMatchObject({
			direction: "HOLD",
			reason: "below_min_confidence",
			confidence: 0,
		});
	});

	it("does not clamp scores above one", () => {
		const strategy = new ScoringStrategy(scoring);
		const decision = strategy.analyze(
			buildWindow(
				60,
				bullishPrevious,
				withLatest({ bbWidth: 0.05, bbLower: 101.5, bbUpper: 110 })
			)
		);
		expect(decision.direction).toBe("BUY");
		expect(decision.confidence).toBeCloseTo(1.05, 10);
	});

	it("returns HOLD with zero confidence for fewer than 50 candles", () => {
		const strategy = new ScoringStrategy(scoring);
		expect(
			strategy.analyze(buildWindow(49, bullishPrevious, bullishLatest))
		).toEqual({
			direction: "HOLD",
			confidence: 0,
			reason: "insufficient_candles",
			scores: undefined,
		});
		expect(strategy.analyze([])).toMatchObject({
			direction: "HOLD",
			reason: "insufficient_candles",
		});
	});

	it("returns HOLD when the latest snapshot fails the quality gate", () => {
		const strategy = new ScoringStrategy(scoring);
		const decision = strategy.analyze(
			buildWindow(60, bullishPrevious, withLatest({ rsi: Number.NaN }))
		);
		expect(decision).toMatchObject({
			direction: "HOLD",
			reason: "data_quality",
			confidence: 0,
		});
	});

	it("downgrades to HOLD when rounded levels collapse onto the entry", () => {
		const strategy = new ScoringStrategy(scoring);
		const decision = strategy.analyze(
			buildWindow(60, bullishPrevious, withLatest({ atr: 0 }))
		);
		expect(decision).toMatchObject({
			direction: "HOLD",
			reason: "invalid_levels",
		});
	});
});

describe("ScoringStrategy.validateSignal", () => {
	it("passes, suppresses, then passes again after the window", () => {
		let now = 1_700_000_000_000;
		const strategy = new ScoringStrategy(scoring, { clock: () => now });

		expect(strategy.validateSignal("BTCUSDT", "BUY")).toBe(true);
		expect(strategy.validateSignal("BTCUSDT", "BUY")).toBe(false);

		now += 5 * MINUTE_MS;
		expect(strategy.validateSignal("BTCUSDT", "BUY")).toBe(false);

		now += 1;
		expect(strategy.validateSignal("BTCUSDT", "BUY")).toBe(true);
		expect(strategy.validateSignal("BTCUSDT", "BUY")).toBe(false);
	});

	it("keys the cooldown on symbol and direction", () => {
		const strategy = new ScoringStrategy(scoring, { clock: () => 0 });
		expect(strategy.validateSignal("BTCUSDT", "BUY")).toBe(true);
		expect(strategy.validateSignal("BTCUSDT", "SELL")).toBe(true);
		expect(strategy.validateSignal("ETHUSDT", "BUY")).toBe(true);
		expect(strategy.validateSignal("BTCUSDT", "BUY")).toBe(false);
	});

	it("accepts a per-call cooldown override", () => {
		let now = 0;
		const strategy = new ScoringStrategy(scoring, { clock: () => now });
		expect(strategy.validateSignal("SOLUSDT", "SELL")).toBe(true);
		now = MINUTE_MS + 1;
		expect(strategy.validateSignal("SOLUSDT", "SELL", 1)).toBe(true);
	});
});

describe("ScoringStrategy helpers", () => {
	it("sizes positions from the capital at risk", () => {
		const strategy = new ScoringStrategy(scoring);
		expect(strategy.calculatePositionSize(10_000, 95_500, 95_200)).toBe(0.667);
		expect(strategy.calculatePositionSize(10_000, 100, 90, 0.01)).toBe(10);
	});

	it("defaults the risk fraction to the configured risk per trade", () => {
		const strategy = new ScoringStrategy(scoring, { riskPerTrade: 0.01 });
		expect(strategy.calculatePositionSize(10_000, 95_500, 95_200)).toBe(0.333);
		expect(strategy.calculatePositionSize(10_000, 100, 90, 0.03)).toBe(30);
		expect(strategy.describe().riskPerTrade).toBe(0.01);
	});

	it("returns zero when entry equals stop", () => {
		const strategy = new ScoringStrategy(scoring);
		expect(strategy.calculatePositionSize(10_000, 100, 100)).toBe(0);
	});

	it("describes its effective parameters", () => {
		const description = new ScoringStrategy(scoring).describe();
		expect(description).toMatchObject({
			name: "weighted_scalping",
			minCandles: 50,
			minConfidence: 0.5,
			cooldownMinutes: 5,
			stopLossMultiplier: 2,
			takeProfitMultiplier: 3,
			riskPerTrade: 0.02,
		});
		expect(description.weights).toEqual(scoring.weights);
		expect(description.weights).not.toBe(scoring.weights);
	});
});
