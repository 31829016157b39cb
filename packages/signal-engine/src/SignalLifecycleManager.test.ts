import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import {
	DEFAULT_SIGNAL_CONFIG,
	HOUR_MS,
	MINUTE_MS,
	PersistenceError,
} from "@scalp-signals/core";
import type {
	Candle,
	MarketDataSource,
	SignalServiceConfig,
} from "@scalp-signals/core";
import { MemoryStore } from "@scalp-signals/persistence";
import {
	ScoringStrategy,
	type StrategyDecision,
} from "@scalp-signals/strategy-engine";
import {
	type SignalStrategy,
	SignalLifecycleManager,
} from "./SignalLifecycleManager";
import { ACTIVE_SIGNALS_KEY, PERFORMANCE_LOG_KEY, serializeSignal } from "./serialization";

const START = Date.UTC(2024, 0, 1);

class FakeMarketData implements MarketDataSource {
	candles: Candle[] | null = Array.from({ length: 5 }, (_, i) => ({
		timestamp: START - (5 - i) * MINUTE_MS,
		open: 100,
		high: 101,
		low: 99,
		close: 100 + i * 0.25,
		volume: 10,
	}));
	prices = new Map<string, number | null>();
	failingSymbols = new Set<string>();

	async getCandles(): Promise<Candle[] | null> {
		return this.candles;
	}

	async getCurrentPrice(symbol: string): Promise<number | null> {
		if (this.failingSymbols.has(symbol)) {
			throw new Error("socket hang up");
		}
		return this.prices.get(symbol) ?? null;
	}
}

class FlakyStore extends MemoryStore {
	failingKeys = new Set<string>();

	async save(key: string, data: unknown): Promise<void> {
		if (this.failingKeys.has(key)) {
			throw new Error("disk full");
		}
		await super.save(key, data);
	}
}

const buyDecision: StrategyDecision = {
	direction: "BUY",
	confidence: 0.81234,
	levels: {
		entryPrice: 101,
		stopLoss: 100,
		takeProfit: 102.5,
		atr: 0.5,
		riskRewardRatio: 1.5,
	},
	scores: { buyScore: 0.81234, sellScore: 0.1, contributions: [], skipped: [] },
};

const holdDecision: StrategyDecision = {
	direction: "HOLD",
	confidence: 0.3,
	reason: "below_min_confidence",
};

const config: SignalServiceConfig = {
	...DEFAULT_SIGNAL_CONFIG,
	lifecycle: {
		maxSignalLifetimeHours: 24,
		maxActiveSignals: 3,
		maxSignalsPerSymbol: 1,
	},
};

describe("SignalLifecycleManager", () => {
	let now: number;
	let marketData: FakeMarketData;
	let store: FlakyStore;
	let decision: StrategyDecision;
	let strategy: SignalStrategy;
	let validateSignal: Mock<SignalStrategy["validateSignal"]>;

	const createManager = () =>
		SignalLifecycleManager.create({
			marketData,
			store,
			strategy,
			config,
			clock: () => now,
		});

	beforeEach(() => {
		now = START;
		marketData = new FakeMarketData();
		store = new FlakyStore();
		decision = buyDecision;
		validateSignal = vi.fn<SignalStrategy["validateSignal"]>(() => true);
		strategy = {
			analyze: () => decision,
			validateSignal,
		};
	});

	describe("analyzeSymbol", () => {
		it("creates, persists and returns a new signal", async () => {
			const manager = await createManager();
			const signal = await manager.analyzeSymbol("BTCUSDT");

			expect(signal).toEqual({
				signalId: "BTCUSDT_1704067200",
				symbol: "BTCUSDT",
				direction: "BUY",
				entryPrice: 101,
				confidence: 0.812,
				stopLoss: 100,
				takeProfit: 102.5,
				atrAtEntry: 0.5,
				riskRewardRatio: 1.5,
				status: "ACTIVE",
				createdAt: START,
			});
			expect(validateSignal).toHaveBeenCalledWith("BTCUSDT", "BUY");
			expect(manager.getActiveSignals()).toHaveLength(1);

			const persisted = await store.load(ACTIVE_SIGNALS_KEY);
			expect(persisted).toEqual({
				BTCUSDT_1704067200: {
					signal_id: "BTCUSDT_1704067200",
					symbol: "BTCUSDT",
					direction: "BUY",
					entry_price: 101,
					confidence: 0.812,
					stop_loss: 100,
					take_profit: 102.5,
					atr_at_entry: 0.5,
					risk_reward_ratio: 1.5,
					status: "ACTIVE",
					created_at: "2024-01-01T00:00:00.000Z",
				},
			});
		});

		it("returns null on HOLD without touching the store", async () => {
			decision = holdDecision;
			const manager = await createManager();

			await expect(manager.analyzeSymbol("BTCUSDT")).resolves.toBeNull();
			expect(store.keys()).toEqual([]);
			expect(validateSignal).not.toHaveBeenCalled();
		});

		it("skips the symbol when market data is unavailable", async () => {
			marketData.candles = null;
			const manager = await createManager();

			await expect(manager.analyzeSymbol("BTCUSDT")).resolves.toBeNull();
			expect(manager.getActiveSignals()).toEqual([]);
		});

		it("returns null when the cooldown rejects the direction", async () => {
			validateSignal.mockReturnValue(false);
			const manager = await createManager();

			await expect(manager.analyzeSymbol("BTCUSDT")).resolves.toBeNull();
			expect(store.keys()).toEqual([]);
		});

		it("isolates unexpected analysis failures", async () => {
			strategy.analyze = () => {
				throw new Error("boom");
			};
			const manager = await createManager();

			await expect(manager.analyzeSymbol("BTCUSDT")).resolves.toBeNull();
		});

		it("checks the open-set caps before the cooldown", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			now += MINUTE_MS;

			await expect(manager.analyzeSymbol("BTCUSDT")).resolves.toBeNull();
			expect(validateSignal).toHaveBeenCalledTimes(1);

			await manager.analyzeSymbol("ETHUSDT");
			now += MINUTE_MS;
			await manager.analyzeSymbol("SOLUSDT");
			now += MINUTE_MS;
			await expect(manager.analyzeSymbol("BNBUSDT")).resolves.toBeNull();
			expect(manager.getActiveSignals().map((signal) => signal.symbol)).toEqual([
				"BTCUSDT",
				"ETHUSDT",
				"SOLUSDT",
			]);
		});

		it("refuses a colliding id without spending the cooldown", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			marketData.prices.set("BTCUSDT", 102.6);
			await manager.monitorActiveSignals();
			expect(validateSignal).toHaveBeenCalledTimes(1);

			await expect(manager.analyzeSymbol("BTCUSDT")).resolves.toBeNull();
			expect(validateSignal).toHaveBeenCalledTimes(1);
			expect(manager.getActiveSignals()).toEqual([]);

			now += 1_000;
			const next = await manager.analyzeSymbol("BTCUSDT");
			expect(next?.signalId).toBe("BTCUSDT_1704067201");
			expect(validateSignal).toHaveBeenCalledTimes(2);
		});

		it("runs raw candles through the scoring strategy", async () => {
			marketData.candles = Array.from({ length: 60 }, (_, i) => ({
				timestamp: START - (60 - i) * MINUTE_MS,
				open: 99 + i,
				high: 100.5 + i,
				low: 99.5 + i,
				close: 100 + i,
				volume: i === 59 ? 1_000 : 100,
			}));
			strategy = new ScoringStrategy(config.scoring, { clock: () => now });
			const manager = await createManager();

			const signal = await manager.analyzeSymbol("BTCUSDT");

			expect(signal).toEqual({
				signalId: "BTCUSDT_1704067200",
				symbol: "BTCUSDT",
				direction: "BUY",
				entryPrice: 159,
				confidence: 0.575,
				stopLoss: 156,
				takeProfit: 163.5,
				atrAtEntry: 1.5,
				riskRewardRatio: 1.5,
				status: "ACTIVE",
				createdAt: START,
			});
		});

		it("does not commit a signal whose save failed", async () => {
			store.failingKeys.add(ACTIVE_SIGNALS_KEY);
			const manager = await createManager();

			await expect(manager.analyzeSymbol("BTCUSDT")).rejects.toBeInstanceOf(
				PersistenceError
			);
			expect(manager.getActiveSignals()).toEqual([]);
		});
	});

	describe("monitorActiveSignals", () => {
		it("closes a BUY signal at its take-profit", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			now += 30 * MINUTE_MS;
			marketData.prices.set("BTCUSDT", 102.6);

			const closed = await manager.monitorActiveSignals();

			expect(closed).toHaveLength(1);
			expect(closed[0]).toMatchObject({
				signalId: "BTCUSDT_1704067200",
				status: "TAKE_PROFIT",
				closePrice: 102.6,
				closedAt: START + 30 * MINUTE_MS,
				pnlPercent: 1.58,
				durationMinutes: 30,
			});
			expect(manager.getActiveSignals()).toEqual([]);
			expect(await store.load(ACTIVE_SIGNALS_KEY)).toEqual({});
			expect(await store.load(PERFORMANCE_LOG_KEY)).toEqual([
				serializeSignal(closed[0]),
			]);
		});

		it("leaves a signal open when its price is unavailable", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			now += 48 * HOUR_MS;

			await expect(manager.monitorActiveSignals()).resolves.toEqual([]);
			expect(manager.getActiveSignals()).toHaveLength(1);
		});

		it("expires a signal just past its lifetime", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			marketData.prices.set("BTCUSDT", 101);

			now = START + 24 * HOUR_MS;
			await expect(manager.monitorActiveSignals()).resolves.toEqual([]);

			now += 1;
			const [expired] = await manager.monitorActiveSignals();
			expect(expired).toMatchObject({
				status: "EXPIRED",
				closePrice: 101,
				pnlPercent: 0,
				durationMinutes: 1440,
			});
		});

		it("keeps going after one signal fails", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			now += 1_000;
			await manager.analyzeSymbol("ETHUSDT");
			marketData.failingSymbols.add("BTCUSDT");
			marketData.prices.set("ETHUSDT", 99);

			const closed = await manager.monitorActiveSignals();

			expect(closed.map((signal) => [signal.symbol, signal.status])).toEqual([
				["ETHUSDT", "STOP_LOSS"],
			]);
			expect(manager.getActiveSignals().map((signal) => signal.symbol)).toEqual([
				"BTCUSDT",
			]);
		});

		it("keeps the signal active when the closure cannot be saved", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			marketData.prices.set("BTCUSDT", 99);
			store.failingKeys.add(ACTIVE_SIGNALS_KEY);

			await expect(manager.monitorActiveSignals()).rejects.toThrow(
				'Failed to persist "active_signals": disk full'
			);
			expect(manager.getActiveSignals()).toHaveLength(1);
			expect(manager.getPerformanceHistory()).toEqual([]);

			store.failingKeys.clear();
			const closed = await manager.monitorActiveSignals();

			expect(closed).toHaveLength(1);
			expect(manager.getActiveSignals()).toEqual([]);
			expect(await store.load(PERFORMANCE_LOG_KEY)).toHaveLength(1);
		});
	});

	describe("state loading", () => {
		it("drops open entries that already closed", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			now += 1_000;
			await manager.analyzeSymbol("ETHUSDT");
			marketData.prices.set("BTCUSDT", 99);
			store.failingKeys.add(ACTIVE_SIGNALS_KEY);
			await expect(manager.monitorActiveSignals()).rejects.toBeInstanceOf(
				PersistenceError
			);
			store.failingKeys.clear();

			const reloaded = await createManager();

			expect(reloaded.getActiveSignals().map((signal) => signal.signalId)).toEqual([
				"ETHUSDT_1704067201",
			]);
			expect(reloaded.getSignal("BTCUSDT_1704067200")).toMatchObject({
				status: "STOP_LOSS",
				closePrice: 99,
			});
		});
	});

	describe("getPerformanceStats", () => {
		it("returns null for an empty window", async () => {
			const manager = await createManager();
			expect(manager.getPerformanceStats()).toBeNull();
		});

		it("aggregates closures inside the window", async () => {
			const manager = await createManager();
			await manager.analyzeSymbol("BTCUSDT");
			now += 1_000;
			await manager.analyzeSymbol("ETHUSDT");
			marketData.prices.set("BTCUSDT", 102.6);
			marketData.prices.set("ETHUSDT", 99);
			await manager.monitorActiveSignals();

			expect(manager.getPerformanceStats(7)).toEqual({
				windowDays: 7,
				totalSignals: 2,
				winners: 1,
				losers: 1,
				winRate: 0.5,
				avgWin: 1.58,
				avgLoss: -1.98,
				profitFactor: 1.58 / 1.98,
				totalPnl: 1.58 + -1.98,
				byStatus: { STOP_LOSS: 1, TAKE_PROFIT: 1, EXPIRED: 0 },
			});

			now += 8 * 24 * HOUR_MS;
			expect(manager.getPerformanceStats(7)).toBeNull();
		});
	});
});
