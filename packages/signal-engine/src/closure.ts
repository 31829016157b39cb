import { HOUR_MS, minutesBetween, roundTo } from "@scalp-signals/core";
import type {
	ActiveSignal,
	ClosedSignal,
	ClosedSignalStatus,
	SignalDirection,
} from "@scalp-signals/core";

/**
 * Price triggers win over expiry: a signal past its lifetime whose stop or
 * target was hit in the same observation closes on that level.
 */
export const evaluateClosure = (
	signal: ActiveSignal,
	price: number,
	now: number,
	maxLifetimeHours: number
): ClosedSignalStatus | null => {
	if (signal.direction === "BUY") {
		if (price <= signal.stopLoss) {
			return "STOP_LOSS";
		}
		if (price >= signal.takeProfit) {
			return "TAKE_PROFIT";
		}
	} else {
		if (price >= signal.stopLoss) {
			return "STOP_LOSS";
		}
		if (price <= signal.takeProfit) {
			return "TAKE_PROFIT";
		}
	}

	if (now - signal.createdAt > maxLifetimeHours * HOUR_MS) {
		return "EXPIRED";
	}
	return null;
};

export const calculatePnlPercent = (
	direction: SignalDirection,
	entryPrice: number,
	closePrice: number
): number => {
	const move =
		direction === "BUY" ? closePrice - entryPrice : entryPrice - closePrice;
	return roundTo((move / entryPrice) * 100, 2);
};

export const closeSignal = (
	signal: ActiveSignal,
	status: ClosedSignalStatus,
	closePrice: number,
	closedAt: number
): ClosedSignal => ({
	...signal,
	status,
	closedAt,
	closePrice,
	pnlPercent: calculatePnlPercent(signal.direction, signal.entryPrice, closePrice),
	durationMinutes: roundTo(minutesBetween(signal.createdAt, closedAt), 1),
});
