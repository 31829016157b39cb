/**
 * Error hierarchy shared by every package. Callers branch on `instanceof`
 * rather than on message text.
 */
export class SignalServiceError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class MissingFieldError extends SignalServiceError {
	constructor(readonly fields: string[], readonly index?: number) {
		super(
			`Candle data is missing required fields: ${fields.join(", ")}` +
				(index === undefined ? "" : ` (first at index ${index})`)
		);
	}
}

export class EmptyCandleSeriesError extends SignalServiceError {
	constructor() {
		super("Candle series is empty");
	}
}

export class ConfigValidationError extends SignalServiceError {
	constructor(readonly problems: string[], readonly source?: string) {
		super(
			`Invalid configuration${source ? ` in ${source}` : ""}: ${problems.join("; ")}`
		);
	}
}

export class PersistenceError extends SignalServiceError {
	constructor(readonly key: string, cause: unknown) {
		super(
			`Failed to persist "${key}": ${
				cause instanceof Error ? cause.message : String(cause)
			}`,
			{ cause }
		);
	}
}

export class SignalDecodeError extends SignalServiceError {
	constructor(readonly path: string, detail: string) {
		super(`Invalid signal record at ${path}: ${detail}`);
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
