import {
	CLOSED_SIGNAL_STATUSES,
	SIGNAL_DIRECTIONS,
	SignalDecodeError,
	createLogger,
	describeError,
	isClosedSignal,
	parseIsoTimestamp,
	toIsoTimestamp,
} from "@scalp-signals/core";
import type {
	ActiveSignal,
	ClosedSignal,
	ClosedSignalStatus,
	Signal,
	SignalDirection,
	SignalStatus,
} from "@scalp-signals/core";

const logger = createLogger("signal-store");

export const ACTIVE_SIGNALS_KEY = "active_signals";
export const PERFORMANCE_LOG_KEY = "performance";

/** Persisted shape of a Signal. Timestamps are ISO-8601 UTC strings. */
export interface SignalRecord {
	signal_id: string;
	symbol: string;
	direction: SignalDirection;
	entry_price: number;
	confidence: number;
	stop_loss: number;
	take_profit: number;
	atr_at_entry: number;
	risk_reward_ratio: number;
	status: SignalStatus;
	created_at: string;
	closed_at?: string;
	close_price?: number;
	pnl_percent?: number;
	duration_minutes?: number;
}

export const serializeSignal = (signal: Signal): SignalRecord => {
	const record: SignalRecord = {
		signal_id: signal.signalId,
		symbol: signal.symbol,
		direction: signal.direction,
		entry_price: signal.entryPrice,
		confidence: signal.confidence,
		stop_loss: signal.stopLoss,
		take_profit: signal.takeProfit,
		atr_at_entry: signal.atrAtEntry,
		risk_reward_ratio: signal.riskRewardRatio,
		status: signal.status,
		created_at: toIsoTimestamp(signal.createdAt),
	};
	if (signal.status === "ACTIVE") {
		return record;
	}
	return {
		...record,
		closed_at: toIsoTimestamp(signal.closedAt),
		close_price: signal.closePrice,
		pnl_percent: signal.pnlPercent,
		duration_minutes: signal.durationMinutes,
	};
};

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

class RecordReader {
	constructor(
		private readonly record: JsonRecord,
		private readonly path: string
	) {}

	string(key: string): string {
		const value = this.record[key];
		if (typeof value !== "string" || !value.length) {
			throw this.fail(key, "expected a non-empty string");
		}
		return value;
	}

	number(key: string): number {
		const value = this.record[key];
		if (typeof value !== "number" || !Number.isFinite(value)) {
			throw this.fail(key, "expected a finite number");
		}
		return value;
	}

	timestamp(key: string): number {
		const ts = parseIsoTimestamp(this.string(key));
		if (ts === null) {
			throw this.fail(key, "expected an ISO-8601 timestamp");
		}
		return ts;
	}

	direction(key: string): SignalDirection {
		const value = this.record[key];
		const direction = SIGNAL_DIRECTIONS.find((entry) => entry === value);
		if (!direction) {
			throw this.fail(key, `unknown direction ${JSON.stringify(value)}`);
		}
		return direction;
	}

	closedStatus(key: string): ClosedSignalStatus | "ACTIVE" {
		const value = this.record[key];
		if (value === "ACTIVE") {
			return value;
		}
		const status = CLOSED_SIGNAL_STATUSES.find((entry) => entry === value);
		if (!status) {
			throw this.fail(key, `unknown status ${JSON.stringify(value)}`);
		}
		return status;
	}

	private fail(key: string, detail: string): SignalDecodeError {
		return new SignalDecodeError(`${this.path}.${key}`, detail);
	}
}

/**
 * Validates every field of a persisted record.
 * @throws SignalDecodeError naming the first offending field
 */
export const deserializeSignal = (raw: unknown, path = "signal"): Signal => {
	if (!isRecord(raw)) {
		throw new SignalDecodeError(path, "expected an object");
	}
	const read = new RecordReader(raw, path);
	const base = {
		signalId: read.string("signal_id"),
		symbol: read.string("symbol"),
		direction: read.direction("direction"),
		entryPrice: read.number("entry_price"),
		confidence: read.number("confidence"),
		stopLoss: read.number("stop_loss"),
		takeProfit: read.number("take_profit"),
		atrAtEntry: read.number("atr_at_entry"),
		riskRewardRatio: read.number("risk_reward_ratio"),
		createdAt: read.timestamp("created_at"),
	};
	const status = read.closedStatus("status");
	if (status === "ACTIVE") {
		return { ...base, status };
	}
	return {
		...base,
		status,
		closedAt: read.timestamp("closed_at"),
		closePrice: read.number("close_price"),
		pnlPercent: read.number("pnl_percent"),
		durationMinutes: read.number("duration_minutes"),
	};
};

export const encodeOpenSet = (
	signals: Iterable<ActiveSignal>
): Record<string, SignalRecord> => {
	const document: Record<string, SignalRecord> = {};
	for (const signal of signals) {
		document[signal.signalId] = serializeSignal(signal);
	}
	return document;
};

export const encodePerformanceLog = (
	signals: readonly ClosedSignal[]
): SignalRecord[] => signals.map(serializeSignal);

const decodeEach = <T extends Signal>(
	entries: [string, unknown][],
	accept: (signal: Signal) => signal is T,
	label: string
): T[] => {
	const decoded: T[] = [];
	for (const [path, raw] of entries) {
		try {
			const signal = deserializeSignal(raw, path);
			if (accept(signal)) {
				decoded.push(signal);
			} else {
				logger.warn("signal_record_skipped", {
					document: label,
					path,
					reason: `unexpected status ${signal.status}`,
				});
			}
		} catch (error) {
			logger.warn("signal_record_skipped", {
				document: label,
				path,
				reason: describeError(error),
			});
		}
	}
	return decoded;
};

const isActive = (signal: Signal): signal is ActiveSignal =>
	signal.status === "ACTIVE";

/** Absent documents decode as empty; undecodable entries are skipped. */
export const decodeOpenSet = (raw: unknown): ActiveSignal[] => {
	if (raw === undefined) {
		return [];
	}
	if (!isRecord(raw)) {
		logger.warn("signal_document_invalid", { document: ACTIVE_SIGNALS_KEY });
		return [];
	}
	return decodeEach(
		Object.entries(raw).map(([id, value]): [string, unknown] => [
			`${ACTIVE_SIGNALS_KEY}.${id}`,
			value,
		]),
		isActive,
		ACTIVE_SIGNALS_KEY
	);
};

export const decodePerformanceLog = (raw: unknown): ClosedSignal[] => {
	if (raw === undefined) {
		return [];
	}
	if (!Array.isArray(raw)) {
		logger.warn("signal_document_invalid", { document: PERFORMANCE_LOG_KEY });
		return [];
	}
	return decodeEach(
		raw.map((value, index): [string, unknown] => [
			`${PERFORMANCE_LOG_KEY}[${index}]`,
			value,
		]),
		isClosedSignal,
		PERFORMANCE_LOG_KEY
	);
};
