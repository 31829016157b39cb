import {
	PersistenceError,
	createLogger,
	describeError,
	roundTo,
	systemClock,
	toIsoTimestamp,
} from "@scalp-signals/core";
import type {
	ActiveSignal,
	ClosedSignal,
	Clock,
	MarketDataSource,
	Signal,
	SignalDirection,
	SignalServiceConfig,
} from "@scalp-signals/core";
import { computeIndicators, summarizeMarket } from "@scalp-signals/indicators";
import {
	type PerformanceAggregate,
	summarizeSignalPerformance,
} from "@scalp-signals/metrics";
import type { KeyValueStore } from "@scalp-signals/persistence";
import type { ScoringStrategy } from "@scalp-signals/strategy-engine";

import { closeSignal, evaluateClosure } from "./closure";
import {
	ACTIVE_SIGNALS_KEY,
	PERFORMANCE_LOG_KEY,
	decodeOpenSet,
	decodePerformanceLog,
	encodeOpenSet,
	encodePerformanceLog,
} from "./serialization";

const logger = createLogger("signal-lifecycle");

const CONFIDENCE_DECIMALS = 3;

export type SignalStrategy = Pick<ScoringStrategy, "analyze" | "validateSignal">;

export interface SignalLifecycleDependencies {
	marketData: MarketDataSource;
	store: KeyValueStore;
	strategy: SignalStrategy;
	config: SignalServiceConfig;
	clock?: Clock;
}

type CapCheck = { allowed: true } | { allowed: false; reason: string };

/**
 * Owns the open-signal set and the performance log. All mutation happens
 * through `analyzeSymbol` and `monitorActiveSignals`, and in-memory state only
 * changes once the corresponding documents have been saved.
 */
export class SignalLifecycleManager {
	private readonly marketData: MarketDataSource;
	private readonly store: KeyValueStore;
	private readonly strategy: SignalStrategy;
	private readonly config: SignalServiceConfig;
	private readonly clock: Clock;
	private openSignals: Map<string, ActiveSignal>;
	private performanceLog: ClosedSignal[];

	private constructor(
		deps: SignalLifecycleDependencies,
		openSignals: Map<string, ActiveSignal>,
		performanceLog: ClosedSignal[]
	) {
		this.marketData = deps.marketData;
		this.store = deps.store;
		this.strategy = deps.strategy;
		this.config = deps.config;
		this.clock = deps.clock ?? systemClock;
		this.openSignals = openSignals;
		this.performanceLog = performanceLog;
	}

	static async create(
		deps: SignalLifecycleDependencies
	): Promise<SignalLifecycleManager> {
		const [rawOpen, rawLog] = await Promise.all([
			deps.store.load(ACTIVE_SIGNALS_KEY),
			deps.store.load(PERFORMANCE_LOG_KEY),
		]);
		const performanceLog = decodePerformanceLog(rawLog);
		const closedIds = new Set(performanceLog.map((signal) => signal.signalId));

		const openSignals = new Map<string, ActiveSignal>();
		for (const signal of decodeOpenSet(rawOpen)) {
			if (closedIds.has(signal.signalId)) {
				logger.warn("stale_open_signal_dropped", { signalId: signal.signalId });
				continue;
			}
			openSignals.set(signal.signalId, signal);
		}

		logger.info("signal_state_loaded", {
			activeSignals: openSignals.size,
			closedSignals: performanceLog.length,
		});
		return new SignalLifecycleManager(deps, openSignals, performanceLog);
	}

	/**
	 * Runs one analysis for a symbol. Resolves null on HOLD, cooldown, caps,
	 * unavailable data or an unexpected failure.
	 * @throws PersistenceError when the new open set could not be saved
	 */
	async analyzeSymbol(symbol: string): Promise<ActiveSignal | null> {
		try {
			return await this.tryAnalyzeSymbol(symbol);
		} catch (error) {
			if (error instanceof PersistenceError) {
				throw error;
			}
			logger.error("symbol_analysis_failed", {
				symbol,
				error: describeError(error),
			});
			return null;
		}
	}

	/**
	 * Checks every open signal against its current price and closes the ones
	 * that hit a level or outlived the configured lifetime. Closures committed
	 * before a failed save stay committed.
	 * @throws PersistenceError when a closure could not be saved
	 */
	async monitorActiveSignals(): Promise<ClosedSignal[]> {
		const closed: ClosedSignal[] = [];
		const maxLifetimeHours = this.config.lifecycle.maxSignalLifetimeHours;

		for (const signal of [...this.openSignals.values()]) {
			try {
				const price = await this.marketData.getCurrentPrice(signal.symbol);
				if (price === null || !Number.isFinite(price) || price <= 0) {
					logger.warn("price_unavailable", {
						signalId: signal.signalId,
						symbol: signal.symbol,
					});
					continue;
				}

				const now = this.clock();
				const status = evaluateClosure(signal, price, now, maxLifetimeHours);
				if (!status) {
					continue;
				}
				const closedSignal = closeSignal(signal, status, price, now);
				await this.commitClosure(closedSignal);
				closed.push(closedSignal);
			} catch (error) {
				if (error instanceof PersistenceError) {
					throw error;
				}
				logger.error("signal_monitor_failed", {
					signalId: signal.signalId,
					error: describeError(error),
				});
			}
		}

		return closed;
	}

	getPerformanceStats(windowDays = 7): PerformanceAggregate | null {
		return summarizeSignalPerformance(this.performanceLog, {
			windowDays,
			now: this.clock(),
		});
	}

	getActiveSignals(): ActiveSignal[] {
		return [...this.openSignals.values()];
	}

	getSignal(signalId: string): Signal | undefined {
		const open = this.openSignals.get(signalId);
		if (open) {
			return open;
		}
		return this.performanceLog.find((signal) => signal.signalId === signalId);
	}

	getPerformanceHistory(): ClosedSignal[] {
		return [...this.performanceLog];
	}

	private async tryAnalyzeSymbol(symbol: string): Promise<ActiveSignal | null> {
		const { timeframe, candleLimit, indicators } = this.config;
		const candles = await this.marketData.getCandles(
			symbol,
			timeframe,
			candleLimit
		);
		if (!candles || !candles.length) {
			logger.warn("market_data_unavailable", { symbol, timeframe });
			return null;
		}

		const { candles: analyzed } = computeIndicators(
			candles.map((candle) => ({ ...candle, symbol })),
			indicators
		);
		logger.debug("market_summary", { summary: summarizeMarket(symbol, analyzed) });
		const decision = this.strategy.analyze(analyzed);
		if (decision.direction === "HOLD") {
			logger.debug("signal_hold", {
				symbol,
				reason: decision.reason,
				confidence: decision.confidence,
			});
			return null;
		}

		const caps = this.checkCaps(symbol);
		if (!caps.allowed) {
			logger.info("signal_capped", { symbol, reason: caps.reason });
			return null;
		}
		const signal = this.buildSignal(symbol, decision.direction, {
			confidence: decision.confidence,
			...decision.levels,
		});
		if (!signal) {
			return null;
		}
		if (!this.strategy.validateSignal(symbol, decision.direction)) {
			return null;
		}

		const nextOpen = new Map(this.openSignals);
		nextOpen.set(signal.signalId, signal);
		await this.saveDocument(ACTIVE_SIGNALS_KEY, encodeOpenSet(nextOpen.values()));
		this.openSignals = nextOpen;

		logger.info("signal_generated", {
			signalId: signal.signalId,
			symbol,
			direction: signal.direction,
			entryPrice: signal.entryPrice,
			confidence: signal.confidence,
			stopLoss: signal.stopLoss,
			takeProfit: signal.takeProfit,
			riskRewardRatio: signal.riskRewardRatio,
		});
		return signal;
	}

	private checkCaps(symbol: string): CapCheck {
		const { maxActiveSignals, maxSignalsPerSymbol } = this.config.lifecycle;
		if (this.openSignals.size >= maxActiveSignals) {
			return {
				allowed: false,
				reason: `${this.openSignals.size} active signals (max ${maxActiveSignals})`,
			};
		}
		let forSymbol = 0;
		for (const signal of this.openSignals.values()) {
			if (signal.symbol === symbol) {
				forSymbol += 1;
			}
		}
		if (forSymbol >= maxSignalsPerSymbol) {
			return {
				allowed: false,
				reason: `${forSymbol} active signals for symbol (max ${maxSignalsPerSymbol})`,
			};
		}
		return { allowed: true };
	}

	private buildSignal(
		symbol: string,
		direction: SignalDirection,
		values: {
			confidence: number;
			entryPrice: number;
			stopLoss: number;
			takeProfit: number;
			atr: number;
			riskRewardRatio: number;
		}
	): ActiveSignal | null {
		const createdAt = this.clock();
		const signalId = `${symbol}_${Math.floor(createdAt / 1000)}`;
		if (this.getSignal(signalId)) {
			logger.warn("signal_id_collision", { signalId });
			return null;
		}
		return {
			signalId,
			symbol,
			direction,
			entryPrice: values.entryPrice,
			confidence: roundTo(values.confidence, CONFIDENCE_DECIMALS),
			stopLoss: values.stopLoss,
			takeProfit: values.takeProfit,
			atrAtEntry: values.atr,
			riskRewardRatio: values.riskRewardRatio,
			status: "ACTIVE",
			createdAt,
		};
	}

	private async commitClosure(signal: ClosedSignal): Promise<void> {
		const nextLog = [...this.performanceLog, signal];
		const nextOpen = new Map(this.openSignals);
		nextOpen.delete(signal.signalId);

		await this.saveDocument(PERFORMANCE_LOG_KEY, encodePerformanceLog(nextLog));
		await this.saveDocument(ACTIVE_SIGNALS_KEY, encodeOpenSet(nextOpen.values()));

		this.performanceLog = nextLog;
		this.openSignals = nextOpen;

		logger.info("signal_closed", {
			signalId: signal.signalId,
			symbol: signal.symbol,
			status: signal.status,
			closePrice: signal.closePrice,
			pnlPercent: signal.pnlPercent,
			durationMinutes: signal.durationMinutes,
			closedAt: toIsoTimestamp(signal.closedAt),
		});
	}

	private async saveDocument(key: string, data: unknown): Promise<void> {
		try {
			await this.store.save(key, data);
		} catch (error) {
			throw error instanceof PersistenceError
				? error
				: new PersistenceError(key, error);
		}
	}
}
