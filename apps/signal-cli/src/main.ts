import path from "node:path";
import {
	createLogger,
	describeError,
	getDefaultConfigDir,
	loadEnvConfig,
	loadSignalConfig,
} from "@scalp-signals/core";
import { BinanceMarketDataClient } from "@scalp-signals/exchange-binance";
import { createPersistenceLayer } from "@scalp-signals/persistence";
import {
	LogSignalDistributor,
	startSignalService,
} from "@scalp-signals/runtime";
import { SignalLifecycleManager } from "@scalp-signals/signal-engine";
import { ScoringStrategy } from "@scalp-signals/strategy-engine";

import { resolveCliOptions } from "./cliArgs";

const logger = createLogger("signal-cli");

const main = async (): Promise<void> => {
	const options = resolveCliOptions(process.argv.slice(2));
	const env = loadEnvConfig();
	const profile = options.profile ?? env.signalProfile;
	const configDir = options.configDir
		? path.resolve(options.configDir)
		: getDefaultConfigDir();
	const dataDir = options.dataDir ? path.resolve(options.dataDir) : env.dataDir;
	const config = loadSignalConfig(configDir, profile);

	logger.info("cli_starting", {
		profile,
		configDir,
		dataDir: options.dryRun ? null : dataDir,
		dryRun: options.dryRun,
		once: options.once,
		symbols: config.symbols,
		timeframe: config.timeframe,
		useTestnet: env.binanceTestnet,
	});

	const manager = await SignalLifecycleManager.create({
		marketData: BinanceMarketDataClient.create(env),
		store: createPersistenceLayer(
			options.dryRun
				? { driver: "memory" }
				: { driver: "file", directory: dataDir }
		),
		strategy: new ScoringStrategy(config.scoring, {
			riskPerTrade: config.risk.riskPerTrade,
		}),
		config,
	});

	const controller = new AbortController();
	const stop = (reason: NodeJS.Signals) => {
		if (controller.signal.aborted) {
			return;
		}
		logger.info("cli_stopping", { reason });
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	const cycles = await startSignalService({
		manager,
		distributor: new LogSignalDistributor(config.risk),
		config,
		signal: controller.signal,
		once: options.once,
	});

	logger.info("cli_stopped", {
		cycles,
		activeSignals: manager.getActiveSignals().length,
	});
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: describeError(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
