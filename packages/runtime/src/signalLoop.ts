import {
	PersistenceError,
	SECOND_MS,
	createLogger,
	describeError,
} from "@scalp-signals/core";
import type {
	ActiveSignal,
	ClosedSignal,
	SignalServiceConfig,
} from "@scalp-signals/core";
import type { SignalLifecycleManager } from "@scalp-signals/signal-engine";

import { type SignalDistributor, toClosureUpdate } from "./distribution";

export const runtimeLogger = createLogger("signal-runtime");

export const PERFORMANCE_WINDOW_DAYS = 7;

export type SignalCycleDriver = Pick<
	SignalLifecycleManager,
	"analyzeSymbol" | "monitorActiveSignals"
>;

export type SignalServiceDriver = SignalCycleDriver &
	Pick<SignalLifecycleManager, "getPerformanceStats" | "getActiveSignals">;

export interface SignalCycleContext {
	manager: SignalCycleDriver;
	distributor: SignalDistributor;
	symbols: readonly string[];
	signal?: AbortSignal;
}

export interface CycleResult {
	generated: ActiveSignal[];
	closed: ClosedSignal[];
	delivered: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const abortableSleep: Sleep = (ms, signal) =>
	new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});

const deliver = async (
	event: string,
	signalId: string,
	send: () => Promise<number>
): Promise<number> => {
	try {
		return await send();
	} catch (error) {
		runtimeLogger.warn("distribution_failed", {
			event,
			signalId,
			error: describeError(error),
		});
		return 0;
	}
};

/**
 * One pass: every symbol in order, then one monitoring sweep. An abort is
 * honoured between symbols and before the sweep, never mid-symbol.
 * @throws PersistenceError from either step
 */
export const runCycle = async (
	context: SignalCycleContext
): Promise<CycleResult> => {
	const { manager, distributor, symbols, signal } = context;
	const result: CycleResult = { generated: [], closed: [], delivered: 0 };

	for (const symbol of symbols) {
		if (signal?.aborted) {
			return result;
		}
		let generated: ActiveSignal | null;
		try {
			generated = await manager.analyzeSymbol(symbol);
		} catch (error) {
			if (error instanceof PersistenceError) {
				throw error;
			}
			runtimeLogger.error("symbol_cycle_failed", {
				symbol,
				error: describeError(error),
			});
			continue;
		}
		if (!generated) {
			continue;
		}
		const newSignal = generated;
		result.generated.push(newSignal);
		result.delivered += await deliver("signal", newSignal.signalId, () =>
			distributor.distributeSignal(newSignal)
		);
	}

	if (signal?.aborted) {
		return result;
	}

	result.closed = await manager.monitorActiveSignals();
	for (const closed of result.closed) {
		result.delivered += await deliver("closure", closed.signalId, () =>
			distributor.distributeClosure(toClosureUpdate(closed))
		);
	}

	runtimeLogger.debug("cycle_completed", {
		generated: result.generated.length,
		closed: result.closed.length,
		delivered: result.delivered,
	});
	return result;
};

export interface SignalServiceOptions {
	manager: SignalServiceDriver;
	distributor: SignalDistributor;
	config: Pick<
		SignalServiceConfig,
		"symbols" | "timeframe" | "analysisIntervalSeconds" | "errorBackoffSeconds"
	>;
	signal?: AbortSignal;
	once?: boolean;
	sleep?: Sleep;
}

/**
 * Runs cycles until `signal` aborts (or after one cycle with `once`).
 * Resolves with the number of cycles started.
 */
export const startSignalService = async (
	options: SignalServiceOptions
): Promise<number> => {
	const { manager, distributor, config, signal, once = false } = options;
	const sleep = options.sleep ?? abortableSleep;

	runtimeLogger.info("signal_service_started", {
		symbols: config.symbols,
		timeframe: config.timeframe,
		analysisIntervalSeconds: config.analysisIntervalSeconds,
		activeSignals: manager.getActiveSignals().length,
	});
	runtimeLogger.info("performance_summary", {
		windowDays: PERFORMANCE_WINDOW_DAYS,
		stats: manager.getPerformanceStats(PERFORMANCE_WINDOW_DAYS),
	});

	let cycles = 0;
	while (!signal?.aborted) {
		cycles += 1;
		let delayMs = config.analysisIntervalSeconds * SECOND_MS;
		try {
			await runCycle({ manager, distributor, symbols: config.symbols, signal });
		} catch (error) {
			delayMs = config.errorBackoffSeconds * SECOND_MS;
			runtimeLogger.error("cycle_failed", {
				cycle: cycles,
				error: describeError(error),
				persistence: error instanceof PersistenceError,
				retryInMs: delayMs,
			});
		}
		if (once) {
			break;
		}
		await sleep(delayMs, signal);
	}

	runtimeLogger.info("signal_service_stopped", { cycles });
	return cycles;
};
