import { MINUTE_MS, systemClock } from "@scalp-signals/core";
import type { Clock, SignalDirection } from "@scalp-signals/core";

export type CooldownCheck =
	| { allowed: true }
	| { allowed: false; remainingMs: number };

/**
 * Last emission time per symbol and direction. A key passes when it has never
 * passed before or when strictly more than the window has elapsed; every pass
 * restarts its timer.
 */
export class CooldownTracker {
	private readonly lastEmission = new Map<string, number>();

	constructor(
		private readonly cooldownMinutes: number,
		private readonly clock: Clock = systemClock
	) {}

	check(
		symbol: string,
		direction: SignalDirection,
		cooldownMinutes = this.cooldownMinutes
	): CooldownCheck {
		const key = this.key(symbol, direction);
		const now = this.clock();
		const last = this.lastEmission.get(key);
		const windowMs = cooldownMinutes * MINUTE_MS;

		if (last === undefined || now - last > windowMs) {
			this.lastEmission.set(key, now);
			return { allowed: true };
		}
		return { allowed: false, remainingMs: windowMs - (now - last) };
	}

	private key(symbol: string, direction: SignalDirection): string {
		return `${symbol}:${direction}`;
	}
}
