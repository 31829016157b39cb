import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import { createLogger, describeError } from "@scalp-signals/core";
import type { Candle, EnvConfig, MarketDataSource } from "@scalp-signals/core";

import { mapCcxtCandleToCandle } from "./ccxtMapper";
import { type RetryOptions, withRetry } from "./retry";
import { toUnifiedPerpSymbol } from "./symbols";

const logger = createLogger("binance");

/** The slice of the ccxt exchange this client calls. */
export interface UsdMExchange {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
	fetchTicker(symbol: string): Promise<{ last?: number; close?: number }>;
}

export interface BinanceClientOptions {
	retry?: RetryOptions;
}

/**
 * Read-only Binance USD-M market data. Both calls resolve null once retries
 * are exhausted so callers can skip the symbol for this cycle.
 */
export class BinanceMarketDataClient implements MarketDataSource {
	constructor(
		private readonly exchange: UsdMExchange,
		private readonly options: BinanceClientOptions = {}
	) {}

	static create(
		env: Pick<EnvConfig, "binanceApiKey" | "binanceApiSecret" | "binanceTestnet">,
		options: BinanceClientOptions = {}
	): BinanceMarketDataClient {
		const client = new ccxt.binanceusdm({
			apiKey: env.binanceApiKey || undefined,
			secret: env.binanceApiSecret || undefined,
			enableRateLimit: true,
			options: {
				defaultType: "future",
			},
		});
		if (env.binanceTestnet) {
			client.setSandboxMode(true);
		}
		return new BinanceMarketDataClient(client, options);
	}

	async getCandles(
		symbol: string,
		interval: string,
		limit: number
	): Promise<Candle[] | null> {
		const unified = toUnifiedPerpSymbol(symbol);
		try {
			const rows = await withRetry(
				`klines ${unified} ${interval}`,
				() => this.exchange.fetchOHLCV(unified, interval, undefined, limit),
				this.options.retry
			);
			return rows.map((row) => mapCcxtCandleToCandle(row, symbol, interval));
		} catch (error) {
			logger.error("candles_unavailable", {
				symbol,
				interval,
				limit,
				error: describeError(error),
			});
			return null;
		}
	}

	async getCurrentPrice(symbol: string): Promise<number | null> {
		const unified = toUnifiedPerpSymbol(symbol);
		try {
			const ticker = await withRetry(
				`ticker ${unified}`,
				() => this.exchange.fetchTicker(unified),
				this.options.retry
			);
			const price = ticker.last ?? ticker.close;
			if (price === undefined || !Number.isFinite(price)) {
				logger.warn("price_missing", { symbol });
				return null;
			}
			return price;
		} catch (error) {
			logger.error("price_unavailable", {
				symbol,
				error: describeError(error),
			});
			return null;
		}
	}
}
