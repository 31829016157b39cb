import { DAY_MS } from "@scalp-signals/core";
import type { ClosedSignal, ClosedSignalStatus } from "@scalp-signals/core";

export interface PerformanceAggregate {
	windowDays: number;
	totalSignals: number;
	winners: number;
	losers: number;
	winRate: number;
	avgWin: number;
	avgLoss: number;
	profitFactor: number;
	totalPnl: number;
	byStatus: Record<ClosedSignalStatus, number>;
}

export interface PerformanceWindow {
	windowDays: number;
	now: number;
}

const sumPnl = (signals: readonly ClosedSignal[]): number =>
	signals.reduce((sum, signal) => sum + signal.pnlPercent, 0);

/**
 * Aggregates signals closed strictly after `now - windowDays`. A signal with
 * zero P&L counts as a loser. Returns null when nothing closed in the window.
 */
export const summarizeSignalPerformance = (
	log: readonly ClosedSignal[],
	{ windowDays, now }: PerformanceWindow
): PerformanceAggregate | null => {
	const cutoff = now - windowDays * DAY_MS;
	const recent = log.filter((signal) => signal.closedAt > cutoff);
	if (!recent.length) {
		return null;
	}

	const winners = recent.filter((signal) => signal.pnlPercent > 0);
	const losers = recent.filter((signal) => signal.pnlPercent <= 0);
	const totalWins = sumPnl(winners);
	const totalLosses = Math.abs(sumPnl(losers));

	const byStatus: Record<ClosedSignalStatus, number> = {
		STOP_LOSS: 0,
		TAKE_PROFIT: 0,
		EXPIRED: 0,
	};
	for (const signal of recent) {
		byStatus[signal.status] += 1;
	}

	return {
		windowDays,
		totalSignals: recent.length,
		winners: winners.length,
		losers: losers.length,
		winRate: winners.length / recent.length,
		avgWin: winners.length ? totalWins / winners.length : 0,
		avgLoss: losers.length ? sumPnl(losers) / losers.length : 0,
		profitFactor: totalLosses > 0 ? totalWins / totalLosses : 0,
		totalPnl: sumPnl(recent),
		byStatus,
	};
};
