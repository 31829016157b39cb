const QUOTES = ["USDT", "USDC"] as const;

/**
 * Converts an exchange id such as `BTCUSDT` into the ccxt unified symbol of
 * the USD-M perpetual, `BTC/USDT:USDT`. Symbols that are already unified, or
 * whose quote is not recognised, pass through uppercased.
 */
export const toUnifiedPerpSymbol = (symbol: string): string => {
	const trimmed = symbol.trim().toUpperCase();
	if (trimmed.includes("/")) {
		return trimmed;
	}
	const quote = QUOTES.find(
		(candidate) => trimmed.endsWith(candidate) && trimmed.length > candidate.length
	);
	if (!quote) {
		return trimmed;
	}
	return `${trimmed.slice(0, -quote.length)}/${quote}:${quote}`;
};
