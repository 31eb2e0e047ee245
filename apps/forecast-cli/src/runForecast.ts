import {
	OUTPUT_FORMATS,
	SERIES_SOURCE_KINDS,
	UNDEFINED_GAIN_POLICIES,
	createLogger,
	ensureOneOf,
	parseTimeframe,
} from "@pricecast/core";
import type {
	ForecastConfig,
	ForecastConfigLoadOptions,
	ModuleLogger,
	OutputFormat,
} from "@pricecast/core";
import { createSeriesSource } from "@pricecast/data";
import type { SeriesSource, SeriesSourceDeps } from "@pricecast/data";
import {
	buildChartSeries,
	formatForecastCsv,
	summarizeForecast,
} from "@pricecast/metrics";
import type { ChartSeries, ForecastSummary } from "@pricecast/metrics";
import { runKalmanFilterDetailed } from "@pricecast/models-quant";
import type { FilterRun } from "@pricecast/models-quant";
import { readNumberArg, readStringArg } from "./cliArgs";
import type { ArgValue } from "./cliArgs";

export interface ForecastOverrides {
	source?: ForecastConfig["source"];
	file?: string;
	exchange?: string;
	symbol?: string;
	timeframe?: string;
	limit?: number;
	length?: number;
	seed?: number;
	start?: number;
	volatility?: number;
	drift?: number;
	undefinedGainPolicy?: ForecastConfig["undefinedGainPolicy"];
	format?: OutputFormat;
}

export interface ForecastCliOptions {
	load: ForecastConfigLoadOptions;
	overrides: ForecastOverrides;
	out?: string;
}

export interface ForecastResult {
	source: string;
	run: FilterRun;
	summary: ForecastSummary;
	chart: ChartSeries;
}

export interface RunForecastDeps extends SeriesSourceDeps {
	seriesSource?: SeriesSource;
	moduleLogger?: ModuleLogger;
}

const optionalOneOf = <T extends string>(
	value: string | undefined,
	allowed: readonly T[],
	field: string
): T | undefined =>
	value === undefined ? undefined : ensureOneOf(value, allowed, field);

export const resolveCliOptions = (
	args: Record<string, ArgValue>
): ForecastCliOptions => ({
	load: {
		envPath: readStringArg(args, "envPath"),
		configDir: readStringArg(args, "configDir"),
		profile: readStringArg(args, "profile"),
	},
	overrides: {
		source: optionalOneOf(
			readStringArg(args, "source"),
			SERIES_SOURCE_KINDS,
			"--source"
		),
		file: readStringArg(args, "file"),
		exchange: readStringArg(args, "exchange"),
		symbol: readStringArg(args, "symbol"),
		timeframe: readStringArg(args, "timeframe"),
		limit: readNumberArg(args, "limit"),
		length: readNumberArg(args, "length"),
		seed: readNumberArg(args, "seed"),
		start: readNumberArg(args, "start"),
		volatility: readNumberArg(args, "volatility"),
		drift: readNumberArg(args, "drift"),
		undefinedGainPolicy: optionalOneOf(
			readStringArg(args, "undefinedGain"),
			UNDEFINED_GAIN_POLICIES,
			"--undefinedGain"
		),
		format: optionalOneOf(readStringArg(args, "format"), OUTPUT_FORMATS, "--format"),
	},
	out: readStringArg(args, "out"),
});

export const applyOverrides = (
	config: ForecastConfig,
	overrides: ForecastOverrides
): ForecastConfig => {
	if (overrides.timeframe) {
		parseTimeframe(overrides.timeframe);
	}
	return {
		...config,
		source: overrides.source ?? config.source,
		file: overrides.file ?? config.file,
		undefinedGainPolicy:
			overrides.undefinedGainPolicy ?? config.undefinedGainPolicy,
		format: overrides.format ?? config.format,
		randomWalk: {
			length: overrides.length ?? config.randomWalk.length,
			start: overrides.start ?? config.randomWalk.start,
			volatility: overrides.volatility ?? config.randomWalk.volatility,
			drift: overrides.drift ?? config.randomWalk.drift,
			seed: overrides.seed ?? config.randomWalk.seed,
		},
		exchange: {
			id: overrides.exchange ?? config.exchange.id,
			symbol: overrides.symbol ?? config.exchange.symbol,
			timeframe: overrides.timeframe ?? config.exchange.timeframe,
			limit: overrides.limit ?? config.exchange.limit,
		},
	};
};

export const runForecast = async (
	config: ForecastConfig,
	deps: RunForecastDeps = {}
): Promise<ForecastResult> => {
	const logger = deps.moduleLogger ?? createLogger("forecast-cli");
	const seriesSource =
		deps.seriesSource ??
		createSeriesSource(config, {
			createClient: deps.createClient,
			logger: deps.logger ?? logger,
			now: deps.now,
		});

	const source = seriesSource.describe();
	const values = await seriesSource.load();
	logger.info("series_loaded", { source, count: values.length });

	const run = runKalmanFilterDetailed(values, {
		undefinedGainPolicy: config.undefinedGainPolicy,
	});
	if (run.undefinedGainSteps > 0) {
		logger.warn("undefined_gain_fallback", {
			source,
			steps: run.undefinedGainSteps,
			policy: config.undefinedGainPolicy,
		});
	}

	const summary = summarizeForecast(run.states, run.noise);
	logger.info("forecast_summary", {
		source,
		...summary,
		undefinedGainSteps: run.undefinedGainSteps,
	});

	return { source, run, summary, chart: buildChartSeries(run.states) };
};

const formatSummaryText = (result: ForecastResult): string => {
	const { summary } = result;
	const fmt = (value: number): string => value.toFixed(6);
	return [
		`Source: ${result.source}`,
		`Observations: ${summary.count}`,
		`Noise (R): ${fmt(summary.noise)}`,
		`Final forecast: ${fmt(summary.finalEstimate)}`,
		`Final error variance: ${fmt(summary.finalErrorVariance)}`,
		`Last gain: ${fmt(summary.lastGain)}`,
		`Mean abs residual: ${fmt(summary.meanAbsResidual)}`,
		`RMSE: ${fmt(summary.rmse)}`,
		`Undefined-gain steps: ${result.run.undefinedGainSteps}`,
	].join("\n");
};

export const renderForecast = (
	result: ForecastResult,
	format: OutputFormat
): string => {
	switch (format) {
		case "csv":
			return formatForecastCsv(result.run.states);
		case "json":
			return JSON.stringify(
				{
					source: result.source,
					noise: result.run.noise,
					undefinedGainSteps: result.run.undefinedGainSteps,
					summary: result.summary,
					chart: result.chart,
					states: result.run.states,
				},
				null,
				2
			);
		case "summary":
			return formatSummaryText(result);
	}
};
