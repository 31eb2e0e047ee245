import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { parseTimeframe } from "./time/time";

export const SERIES_SOURCE_KINDS = ["random-walk", "file", "exchange"] as const;
export type SeriesSourceKind = (typeof SERIES_SOURCE_KINDS)[number];

export const UNDEFINED_GAIN_POLICIES = ["zero", "throw"] as const;
export type UndefinedGainPolicyName = (typeof UNDEFINED_GAIN_POLICIES)[number];

export const OUTPUT_FORMATS = ["csv", "json", "summary"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface RandomWalkConfig {
	length: number;
	start: number;
	volatility: number;
	drift: number;
	seed: number;
}

export interface ExchangeSourceConfig {
	id: string;
	symbol: string;
	timeframe: string;
	limit: number;
}

export interface ForecastConfig {
	profile: string;
	source: SeriesSourceKind;
	file?: string;
	undefinedGainPolicy: UndefinedGainPolicyName;
	format: OutputFormat;
	randomWalk: RandomWalkConfig;
	exchange: ExchangeSourceConfig;
}

export interface ConfigMetadata {
	path: string;
	profile: string;
}

export interface ForecastConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

export const DEFAULT_PROFILE = "default";

export const DEFAULT_RANDOM_WALK: RandomWalkConfig = {
	length: 250,
	start: 100,
	volatility: 1,
	drift: 0,
	seed: 1,
};

export const DEFAULT_EXCHANGE_SOURCE: ExchangeSourceConfig = {
	id: "binance",
	symbol: "BTC/USDT",
	timeframe: "1h",
	limit: 200,
};

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	configMetadata.set(config, metadata);
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return isRecord(parsed) && Array.isArray(parsed.workspaces);
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
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

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readSection = (
	file: Record<string, unknown>,
	key: string
): Record<string, unknown> => {
	const value = file[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new Error(`Config field ${key} must be an object`);
	}
	return value;
};

const ensureNumber = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new Error(`Config field ${field} must be a finite number`);
	}
	return value;
};

const ensurePositiveInteger = (
	value: unknown,
	field: string,
	fallback: number
): number => {
	const num = ensureNumber(value, field, fallback);
	if (!Number.isInteger(num) || num < 1) {
		throw new Error(`Config field ${field} must be a positive integer`);
	}
	return num;
};

const ensureString = (
	value: unknown,
	field: string,
	fallback: string
): string => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "string" || !value.trim().length) {
		throw new Error(`Config field ${field} must be a non-empty string`);
	}
	return value.trim();
};

export const ensureOneOf = <T extends string>(
	value: unknown,
	allowed: readonly T[],
	field: string
): T => {
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) {
		throw new Error(
			`Invalid ${field}: ${String(value)}. Expected one of ${allowed.join(", ")}`
		);
	}
	return match;
};

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new Error(
			`Invalid JSON in ${filePath}: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};

export const resolveProfilePath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "forecast", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new Error(
		`Forecast config not found. Looked for ${candidates.join(", ")}`
	);
};

/**
 * Validates a parsed profile file. Missing sections fall back to the
 * defaults; present fields must have the right type.
 */
export const parseForecastConfig = (
	raw: unknown,
	profile: string
): ForecastConfig => {
	if (!isRecord(raw)) {
		throw new Error(`Forecast config ${profile} must be a JSON object`);
	}
	const walk = readSection(raw, "randomWalk");
	const exchange = readSection(raw, "exchange");

	const volatility = ensureNumber(
		walk.volatility,
		"randomWalk.volatility",
		DEFAULT_RANDOM_WALK.volatility
	);
	if (volatility < 0) {
		throw new Error("Config field randomWalk.volatility must be >= 0");
	}

	const timeframe = ensureString(
		exchange.timeframe,
		"exchange.timeframe",
		DEFAULT_EXCHANGE_SOURCE.timeframe
	);
	parseTimeframe(timeframe);

	return {
		profile,
		source: ensureOneOf(raw.source ?? "random-walk", SERIES_SOURCE_KINDS, "source"),
		file:
			raw.file === undefined ? undefined : ensureString(raw.file, "file", ""),
		undefinedGainPolicy: ensureOneOf(
			raw.undefinedGainPolicy ?? "zero",
			UNDEFINED_GAIN_POLICIES,
			"undefinedGainPolicy"
		),
		format: ensureOneOf(raw.format ?? "csv", OUTPUT_FORMATS, "format"),
		randomWalk: {
			length: ensurePositiveInteger(
				walk.length,
				"randomWalk.length",
				DEFAULT_RANDOM_WALK.length
			),
			start: ensureNumber(walk.start, "randomWalk.start", DEFAULT_RANDOM_WALK.start),
			volatility,
			drift: ensureNumber(walk.drift, "randomWalk.drift", DEFAULT_RANDOM_WALK.drift),
			seed: ensureNumber(walk.seed, "randomWalk.seed", DEFAULT_RANDOM_WALK.seed),
		},
		exchange: {
			id: ensureString(exchange.id, "exchange.id", DEFAULT_EXCHANGE_SOURCE.id),
			symbol: ensureString(
				exchange.symbol,
				"exchange.symbol",
				DEFAULT_EXCHANGE_SOURCE.symbol
			),
			timeframe,
			limit: ensurePositiveInteger(
				exchange.limit,
				"exchange.limit",
				DEFAULT_EXCHANGE_SOURCE.limit
			),
		},
	};
};

const applyEnvOverrides = (config: ForecastConfig): ForecastConfig => {
	const source = readOptionalEnvVar("PRICECAST_SOURCE");
	const exchangeId = readOptionalEnvVar("PRICECAST_EXCHANGE");
	const symbol = readOptionalEnvVar("PRICECAST_SYMBOL");
	const timeframe = readOptionalEnvVar("PRICECAST_TIMEFRAME");
	if (timeframe) {
		parseTimeframe(timeframe);
	}
	return {
		...config,
		source: source
			? ensureOneOf(source, SERIES_SOURCE_KINDS, "PRICECAST_SOURCE")
			: config.source,
		exchange: {
			...config.exchange,
			id: exchangeId ?? config.exchange.id,
			symbol: symbol ?? config.exchange.symbol,
			timeframe: timeframe ?? config.exchange.timeframe,
		},
	};
};

export const loadForecastConfig = (
	options: ForecastConfigLoadOptions = {}
): ForecastConfig => {
	loadEnvFiles(findWorkspaceRoot(), options.envPath);

	const profile =
		options.profile ?? readOptionalEnvVar("PRICECAST_PROFILE") ?? DEFAULT_PROFILE;
	const configDir = options.configDir ?? getDefaultConfigDir();
	const profilePath = resolveProfilePath(configDir, profile);
	const config = applyEnvOverrides(
		parseForecastConfig(readJsonFile(profilePath), profile)
	);
	return withConfigMetadata(config, {
		path: profilePath,
		profile,
	});
};
