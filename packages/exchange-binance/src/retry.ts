import { createLogger, describeError } from "@scalp-signals/core";

const logger = createLogger("binance-retry");

export interface RetryOptions {
	attempts?: number;
	backoffMs?: number;
	sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` up to `attempts` times, waiting `backoffMs * attempt` between
 * tries. Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(
	label: string,
	fn: () => Promise<T>,
	options: RetryOptions = {}
): Promise<T> {
	const { attempts = 3, backoffMs = 500, sleep: wait = sleep } = options;
	let lastError: unknown;

	for (let attempt = 1; attempt <= attempts; attempt++) {
		try {
			return await fn();
		} catch (error) {
			lastError = error;
			if (attempt === attempts) {
				break;
			}
			const delayMs = backoffMs * attempt;
			logger.warn("request_retry", {
				request: label,
				attempt,
				attempts,
				delayMs,
				error: describeError(error),
			});
			await wait(delayMs);
		}
	}

	throw lastError;
}
