export * from "./time";

export interface Candle {
	symbol?: string;
	timeframe?: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export const CANDLE_FIELDS = [
	"timestamp",
	"open",
	"high",
	"low",
	"close",
	"volume",
] as const;

export type CandleField = (typeof CANDLE_FIELDS)[number];

export interface IndicatorSnapshot {
	emaFast: number;
	emaSlow: number;
	rsi: number;
	bbUpper: number;
	bbMiddle: number;
	bbLower: number;
	bbWidth: number;
	vwap: number;
	volumeMa: number;
	volumeRatio: number;
	trueRange: number;
	atr: number;
	priceChange: number;
	priceChangeMa: number;
	momentum: number;
}

export type IndicatorField = keyof IndicatorSnapshot;

/**
 * Candle paired with whatever indicator values could be computed for it.
 * Fields are optional because an indicator family may fail as a whole.
 */
export interface AnalyzedCandle extends Candle {
	indicators: Partial<IndicatorSnapshot>;
}

export const SIGNAL_DIRECTIONS = ["BUY", "SELL"] as const;
export type SignalDirection = (typeof SIGNAL_DIRECTIONS)[number];

export const CLOSED_SIGNAL_STATUSES = [
	"STOP_LOSS",
	"TAKE_PROFIT",
	"EXPIRED",
] as const;
export type ClosedSignalStatus = (typeof CLOSED_SIGNAL_STATUSES)[number];
export type SignalStatus = "ACTIVE" | ClosedSignalStatus;

export interface ProtectiveLevels {
	entryPrice: number;
	stopLoss: number;
	takeProfit: number;
	atr: number;
	riskRewardRatio: number;
}

interface SignalFields {
	signalId: string;
	symbol: string;
	direction: SignalDirection;
	entryPrice: number;
	confidence: number;
	stopLoss: number;
	takeProfit: number;
	atrAtEntry: number;
	riskRewardRatio: number;
	createdAt: number;
}

export interface ActiveSignal extends Readonly<SignalFields> {
	readonly status: "ACTIVE";
}

export interface ClosedSignal extends Readonly<SignalFields> {
	readonly status: ClosedSignalStatus;
	readonly closedAt: number;
	readonly closePrice: number;
	readonly pnlPercent: number;
	readonly durationMinutes: number;
}

export type Signal = ActiveSignal | ClosedSignal;

export const isClosedSignal = (signal: Signal): signal is ClosedSignal =>
	signal.status !== "ACTIVE";

export interface SignalClosureUpdate {
	signalId: string;
	symbol: string;
	status: ClosedSignalStatus;
	pnlPercent: number;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Market-data collaborator. Both calls resolve null when the data is
 * unavailable; retrying is the implementation's concern.
 */
export interface MarketDataSource {
	getCandles(
		symbol: string,
		interval: string,
		limit: number
	): Promise<Candle[] | null>;
	getCurrentPrice(symbol: string): Promise<number | null>;
}
