export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel =>
	Object.hasOwn(LEVELS, value);

export const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

interface LogSettings {
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
	pretty: boolean;
	json: boolean;
}

// Read per call: .env files are loaded after this module is imported.
const resolveLogSettings = (env: NodeJS.ProcessEnv = process.env): LogSettings => {
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	const entries = (env.LOG_MODULE ?? "")
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return {
		minLevel: normalizeLevel(env.LOG_LEVEL),
		moduleFilter: entries.length ? new Set(entries) : null,
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

const shouldLog = (
	settings: LogSettings,
	level: LogLevel,
	moduleName: string
): boolean => {
	if (LEVELS[level] < LEVELS[settings.minLevel]) {
		return false;
	}
	if (settings.moduleFilter && !settings.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const settings = resolveLogSettings();
	if (!shouldLog(settings, payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (settings.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (settings.json) {
		try {
			console.error(JSON.stringify(sanitizeLogPayload(base)));
		} catch (err) {
			console.error(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

/**
 * Produces a JSON-safe copy of a log payload: bigint becomes a string,
 * Errors and Dates are flattened, functions and cycles are replaced by
 * markers.
 */
export const sanitizeLogPayload = (
	payload: BaseLogPayload
): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clone: Record<string, unknown> = {};
	for (const [key, nested] of Object.entries(payload)) {
		clone[key] = sanitizeValue(nested, seen);
	}
	return clone;
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.error(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "forecast_summary": {
				printForecastSummary(rest);
				break;
			}
			case "series_loaded": {
				printSeriesLoaded(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const readNumber = (value: unknown): number | undefined =>
	typeof value === "number" ? value : undefined;

const readString = (value: unknown): string | undefined =>
	typeof value === "string" ? value : undefined;

const printForecastSummary = (rest: Record<string, unknown>): void => {
	const fmt = (value: unknown): string => {
		const num = readNumber(value);
		return num === undefined ? "n/a" : num.toFixed(4);
	};
	console.table([
		{
			source: readString(rest.source) ?? "-",
			count: readNumber(rest.count),
			noise: fmt(rest.noise),
			finalEstimate: fmt(rest.finalEstimate),
			finalErrorVariance: fmt(rest.finalErrorVariance),
			lastGain: fmt(rest.lastGain),
			rmse: fmt(rest.rmse),
			undefinedGainSteps: readNumber(rest.undefinedGainSteps),
		},
	]);
};

const printSeriesLoaded = (rest: Record<string, unknown>): void => {
	const source = readString(rest.source) ?? "-";
	const count = readNumber(rest.count);
	console.error(`  ${source}: ${count ?? "?"} observations`);
};
