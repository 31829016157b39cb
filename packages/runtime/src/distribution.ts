import { createLogger } from "@scalp-signals/core";
import type {
	ActiveSignal,
	ClosedSignal,
	ClosedSignalStatus,
	RiskRecommendation,
	SignalClosureUpdate,
} from "@scalp-signals/core";

const logger = createLogger("distribution");

/**
 * Delivery collaborator. Both calls resolve the number of recipients reached;
 * the lifecycle never depends on the result.
 */
export interface SignalDistributor {
	distributeSignal(signal: ActiveSignal): Promise<number>;
	distributeClosure(update: SignalClosureUpdate): Promise<number>;
}

const formatPrice = (value: number): string =>
	`$${value.toLocaleString("en-US", {
		minimumFractionDigits: 2,
		maximumFractionDigits: 2,
	})}`;

const CLOSURE_TITLES: Record<ClosedSignalStatus, string> = {
	TAKE_PROFIT: "Take profit reached",
	STOP_LOSS: "Stop loss hit",
	EXPIRED: "Signal expired",
};

export const toClosureUpdate = (signal: ClosedSignal): SignalClosureUpdate => ({
	signalId: signal.signalId,
	symbol: signal.symbol,
	status: signal.status,
	pnlPercent: signal.pnlPercent,
});

const formatPercent = (fraction: number): string =>
	`${Number((fraction * 100).toFixed(2))}%`;

/** Appends the leverage and risk lines when a recommendation is given. */
export const formatSignalMessage = (
	signal: ActiveSignal,
	risk?: RiskRecommendation
): string => {
	const side = signal.direction === "BUY" ? "LONG" : "SHORT";
	const lines = [
		`${signal.direction} signal (${side}) ${signal.symbol}`,
		`Entry: ${formatPrice(signal.entryPrice)}`,
		`Confidence: ${Math.round(signal.confidence * 100)}%`,
		`Stop loss: ${formatPrice(signal.stopLoss)}`,
		`Take profit: ${formatPrice(signal.takeProfit)}`,
		`Risk/Reward: 1:${signal.riskRewardRatio.toFixed(2)}`,
	];
	if (risk) {
		lines.push(
			`Leverage: ${risk.leverage}x`,
			`Risk per trade: ${formatPercent(risk.riskPerTrade)}`
		);
	}
	lines.push(`Signal ID: ${signal.signalId}`);
	return lines.join("\n");
};

export const formatClosureMessage = (update: SignalClosureUpdate): string => {
	const sign = update.pnlPercent >= 0 ? "+" : "";
	return [
		`${CLOSURE_TITLES[update.status]}: ${update.symbol}`,
		`Result: ${sign}${update.pnlPercent.toFixed(2)}%`,
		`Signal ID: ${update.signalId}`,
	].join("\n");
};

/** Writes each message to the log; stands in for a chat or webhook client. */
export class LogSignalDistributor implements SignalDistributor {
	constructor(private readonly risk?: RiskRecommendation) {}

	async distributeSignal(signal: ActiveSignal): Promise<number> {
		logger.info("signal_message", {
			signalId: signal.signalId,
			message: formatSignalMessage(signal, this.risk),
		});
		return 1;
	}

	async distributeClosure(update: SignalClosureUpdate): Promise<number> {
		logger.info("closure_message", {
			signalId: update.signalId,
			message: formatClosureMessage(update),
		});
		return 1;
	}
}
