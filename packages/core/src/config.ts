import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigValidationError } from "./errors";
import { isSupportedTimeframe } from "./time";

export interface IndicatorConfig {
	emaFast: number;
	emaSlow: number;
	rsiPeriod: number;
	bollingerPeriod: number;
	bollingerStd: number;
	atrPeriod: number;
}

export interface IndicatorWeights {
	trend: number;
	momentum: number;
	bollinger: number;
	vwap: number;
	volume: number;
	priceAction: number;
}

export const WEIGHT_KEYS = [
	"trend",
	"momentum",
	"bollinger",
	"vwap",
	"volume",
	"priceAction",
] as const satisfies readonly (keyof IndicatorWeights)[];

export interface ScoringConfig {
	weights: IndicatorWeights;
	rsiOversold: number;
	rsiOverbought: number;
	minConfidence: number;
	minVolumeRatio: number;
	minVolatility: number;
	stopLossMultiplier: number;
	takeProfitMultiplier: number;
	signalCooldownMinutes: number;
	pricePrecision: number;
	minCandles: number;
}

export interface LifecycleConfig {
	maxSignalLifetimeHours: number;
	maxActiveSignals: number;
	maxSignalsPerSymbol: number;
}

/**
 * Shown alongside signals and used as the default sizing fraction; no limit
 * here is enforced.
 */
export interface RiskRecommendation {
	leverage: number;
	riskPerTrade: number;
	maxDailyLoss: number;
	maxOpenTrades: number;
}

export interface SignalServiceConfig {
	symbols: string[];
	timeframe: string;
	analysisIntervalSeconds: number;
	errorBackoffSeconds: number;
	candleLimit: number;
	indicators: IndicatorConfig;
	scoring: ScoringConfig;
	lifecycle: LifecycleConfig;
	risk: RiskRecommendation;
}

export const WEIGHT_SUM_TOLERANCE = 0.01;
export const MIN_ANALYSIS_CANDLES = 50;

export const DEFAULT_SIGNAL_CONFIG: SignalServiceConfig = {
	symbols: ["BTCUSDT", "ETHUSDT", "SOLUSDT", "BNBUSDT"],
	timeframe: "1m",
	analysisIntervalSeconds: 10,
	errorBackoffSeconds: 30,
	candleLimit: 100,
	indicators: {
		emaFast: 9,
		emaSlow: 21,
		rsiPeriod: 14,
		bollingerPeriod: 20,
		bollingerStd: 2,
		atrPeriod: 14,
	},
	scoring: {
		weights: {
			trend: 0.25,
			momentum: 0.2,
			bollinger: 0.15,
			vwap: 0.15,
			volume: 0.15,
			priceAction: 0.1,
		},
		rsiOversold: 30,
		rsiOverbought: 70,
		minConfidence: 0.5,
		minVolumeRatio: 1.5,
		minVolatility: 0.02,
		stopLossMultiplier: 2,
		takeProfitMultiplier: 3,
		signalCooldownMinutes: 5,
		pricePrecision: 2,
		minCandles: 50,
	},
	lifecycle: {
		maxSignalLifetimeHours: 24,
		maxActiveSignals: 10,
		maxSignalsPerSymbol: 2,
	},
	risk: {
		leverage: 3,
		riskPerTrade: 0.02,
		maxDailyLoss: 0.05,
		maxOpenTrades: 3,
	},
};

export type ConfigSourceType = "file" | "embedded";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const metadataStore = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	metadataStore.set(config, {
		...(metadataStore.get(config) ?? {}),
		...metadata,
	});
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	metadataStore.get(config) ?? null;

let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = [path.join("config", "signals"), ".git"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((entry) => fs.existsSync(path.join(current, entry)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

export interface EnvConfig {
	binanceApiKey: string;
	binanceApiSecret: string;
	binanceTestnet: boolean;
	signalProfile: string;
	dataDir: string;
}

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const loadedEnvFiles = new Set<string>();

export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env")
): EnvConfig => {
	if (!loadedEnvFiles.has(envPath) && fs.existsSync(envPath)) {
		dotenv.config({ path: envPath });
		loadedEnvFiles.add(envPath);
	}

	const dataDir = readOptionalEnvVar("DATA_DIR");
	return {
		binanceApiKey: readOptionalEnvVar("BINANCE_API_KEY") ?? "",
		binanceApiSecret: readOptionalEnvVar("BINANCE_API_SECRET") ?? "",
		binanceTestnet: readOptionalEnvVar("BINANCE_TESTNET")?.toLowerCase() === "true",
		signalProfile: readOptionalEnvVar("SIGNAL_PROFILE") ?? "default",
		dataDir: dataDir
			? path.resolve(findWorkspaceRoot(), dataDir)
			: path.join(findWorkspaceRoot(), "data"),
	};
};

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonFile = (filePath: string): unknown =>
	JSON.parse(fs.readFileSync(filePath, "utf-8"));

const INDICATOR_KEYS = [
	"emaFast",
	"emaSlow",
	"rsiPeriod",
	"bollingerPeriod",
	"bollingerStd",
	"atrPeriod",
] as const satisfies readonly (keyof IndicatorConfig)[];

const SCORING_KEYS = [
	"rsiOversold",
	"rsiOverbought",
	"minConfidence",
	"minVolumeRatio",
	"minVolatility",
	"stopLossMultiplier",
	"takeProfitMultiplier",
	"signalCooldownMinutes",
	"pricePrecision",
	"minCandles",
] as const satisfies readonly (keyof ScoringConfig)[];

const LIFECYCLE_KEYS = [
	"maxSignalLifetimeHours",
	"maxActiveSignals",
	"maxSignalsPerSymbol",
] as const satisfies readonly (keyof LifecycleConfig)[];

const RISK_KEYS = [
	"leverage",
	"riskPerTrade",
	"maxDailyLoss",
	"maxOpenTrades",
] as const satisfies readonly (keyof RiskRecommendation)[];

const LOOP_KEYS = [
	"analysisIntervalSeconds",
	"errorBackoffSeconds",
	"candleLimit",
] as const satisfies readonly (keyof SignalServiceConfig)[];

/**
 * Reads numeric fields out of an untyped section, falling back to defaults for
 * absent keys and recording a problem for present-but-invalid ones.
 */
const readNumbers = <K extends string>(
	raw: unknown,
	keys: readonly K[],
	defaults: Record<K, number>,
	section: string,
	problems: string[]
): Record<K, number> => {
	const result: Record<K, number> = { ...defaults };
	if (raw === undefined) {
		return result;
	}
	if (!isRecord(raw)) {
		problems.push(`${section} must be an object`);
		return result;
	}
	for (const key of keys) {
		const value = raw[key];
		if (value === undefined) {
			continue;
		}
		if (typeof value !== "number" || !Number.isFinite(value)) {
			problems.push(`${section}.${key} must be a finite number`);
			continue;
		}
		result[key] = value;
	}
	return result;
};

const readWeights = (raw: unknown, problems: string[]): IndicatorWeights => {
	if (raw === undefined) {
		return { ...DEFAULT_SIGNAL_CONFIG.scoring.weights };
	}
	if (!isRecord(raw)) {
		problems.push("scoring.weights must be an object");
		return { ...DEFAULT_SIGNAL_CONFIG.scoring.weights };
	}
	const weights = { ...DEFAULT_SIGNAL_CONFIG.scoring.weights };
	for (const key of WEIGHT_KEYS) {
		const value = raw[key];
		if (typeof value !== "number" || !Number.isFinite(value)) {
			problems.push(`scoring.weights.${key} must be a finite number`);
			continue;
		}
		weights[key] = value;
	}
	return weights;
};

const readSymbols = (raw: unknown, problems: string[]): string[] => {
	if (raw === undefined) {
		return [...DEFAULT_SIGNAL_CONFIG.symbols];
	}
	if (!Array.isArray(raw) || raw.some((entry) => typeof entry !== "string")) {
		problems.push("symbols must be an array of strings");
		return [];
	}
	return raw
		.map((entry) => String(entry).trim().toUpperCase())
		.filter((entry) => entry.length > 0);
};

export const sumWeights = (weights: IndicatorWeights): number =>
	WEIGHT_KEYS.reduce((acc, key) => acc + weights[key], 0);

export const validateSignalConfig = (config: SignalServiceConfig): string[] => {
	const problems: string[] = [];
	const { indicators, scoring, lifecycle } = config;

	const total = sumWeights(scoring.weights);
	if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
		problems.push(
			`scoring.weights must sum to 1.0 (±${WEIGHT_SUM_TOLERANCE}), got ${total.toFixed(4)}`
		);
	}
	for (const key of WEIGHT_KEYS) {
		if (scoring.weights[key] < 0) {
			problems.push(`scoring.weights.${key} must not be negative`);
		}
	}
	if (scoring.minConfidence < 0 || scoring.minConfidence > 1) {
		problems.push("scoring.minConfidence must be between 0.0 and 1.0");
	}
	if (scoring.rsiOversold >= scoring.rsiOverbought) {
		problems.push("scoring.rsiOversold must be below scoring.rsiOverbought");
	}
	if (scoring.stopLossMultiplier <= 0 || scoring.takeProfitMultiplier <= 0) {
		problems.push("protective level multipliers must be positive");
	}
	if (!Number.isInteger(scoring.pricePrecision) || scoring.pricePrecision < 0) {
		problems.push("scoring.pricePrecision must be a non-negative integer");
	}
	if (scoring.signalCooldownMinutes < 0) {
		problems.push("scoring.signalCooldownMinutes must not be negative");
	}
	if (scoring.minCandles < MIN_ANALYSIS_CANDLES) {
		problems.push(
			`scoring.minCandles must be at least ${MIN_ANALYSIS_CANDLES}, got ${scoring.minCandles}`
		);
	}

	const periods: (keyof IndicatorConfig)[] = [
		"emaFast",
		"emaSlow",
		"rsiPeriod",
		"bollingerPeriod",
		"atrPeriod",
	];
	for (const key of periods) {
		if (!Number.isInteger(indicators[key]) || indicators[key] <= 0) {
			problems.push(`indicators.${key} must be a positive integer`);
		}
	}
	if (indicators.emaFast >= indicators.emaSlow) {
		problems.push("indicators.emaFast must be shorter than indicators.emaSlow");
	}
	if (indicators.bollingerStd <= 0) {
		problems.push("indicators.bollingerStd must be positive");
	}

	if (lifecycle.maxSignalLifetimeHours <= 0) {
		problems.push("lifecycle.maxSignalLifetimeHours must be positive");
	}
	if (lifecycle.maxActiveSignals < 1 || lifecycle.maxSignalsPerSymbol < 1) {
		problems.push("lifecycle signal caps must be at least 1");
	}

	if (!config.symbols.length) {
		problems.push("symbols must list at least one instrument");
	}
	if (!isSupportedTimeframe(config.timeframe)) {
		problems.push(`timeframe "${config.timeframe}" is not supported`);
	}
	if (config.candleLimit < scoring.minCandles) {
		problems.push("candleLimit must be at least scoring.minCandles");
	}
	if (config.analysisIntervalSeconds <= 0 || config.errorBackoffSeconds <= 0) {
		problems.push("loop intervals must be positive");
	}

	return problems;
};

/**
 * Builds a full config from an untyped document, filling absent keys from
 * DEFAULT_SIGNAL_CONFIG. Throws ConfigValidationError listing every problem.
 */
export const resolveSignalConfig = (
	raw: unknown,
	source?: string
): SignalServiceConfig => {
	const problems: string[] = [];
	const doc = isRecord(raw) ? raw : {};
	if (!isRecord(raw)) {
		problems.push("config root must be an object");
	}
	const defaults = DEFAULT_SIGNAL_CONFIG;
	const scoringRaw = isRecord(doc.scoring) ? doc.scoring : undefined;

	let timeframe = defaults.timeframe;
	if (doc.timeframe !== undefined) {
		if (typeof doc.timeframe === "string") {
			timeframe = doc.timeframe.trim();
		} else {
			problems.push("timeframe must be a string");
		}
	}

	const config: SignalServiceConfig = {
		symbols: readSymbols(doc.symbols, problems),
		timeframe,
		...readNumbers(doc, LOOP_KEYS, defaults, "root", problems),
		indicators: readNumbers(
			doc.indicators,
			INDICATOR_KEYS,
			defaults.indicators,
			"indicators",
			problems
		),
		scoring: {
			...readNumbers(
				doc.scoring,
				SCORING_KEYS,
				defaults.scoring,
				"scoring",
				problems
			),
			weights: readWeights(scoringRaw?.weights, problems),
		},
		lifecycle: readNumbers(
			doc.lifecycle,
			LIFECYCLE_KEYS,
			defaults.lifecycle,
			"lifecycle",
			problems
		),
		risk: readNumbers(doc.risk, RISK_KEYS, defaults.risk, "risk", problems),
	};

	problems.push(...validateSignalConfig(config));
	if (problems.length) {
		throw new ConfigValidationError(problems, source);
	}
	return config;
};

export const resolveSignalConfigPath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "signals", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new Error(
		`Signal config not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadSignalConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): SignalServiceConfig => {
	const configPath = resolveSignalConfigPath(configDir, profile);
	const config = resolveSignalConfig(readJsonFile(configPath), configPath);
	return withConfigMetadata(config, {
		source: "file",
		path: configPath,
		profile,
	});
};
