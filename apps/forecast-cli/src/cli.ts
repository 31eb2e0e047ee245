import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { createLogger, getConfigMetadata, loadForecastConfig } from "@pricecast/core";
import { parseCliArgs } from "./cliArgs";
import {
	applyOverrides,
	renderForecast,
	resolveCliOptions,
	runForecast,
} from "./runForecast";
import type { RunForecastDeps } from "./runForecast";

export const USAGE = `Usage:
  npm run forecast -- [file] [options]

Options (all optional):
  --profile <name>          Config profile under config/forecast (default: default)
  --source <kind>           random-walk | file | exchange
  --file <path>             Series file (.json, .csv or one value per line)
  --exchange <id>           Exchange for --source exchange (binance, mexc)
  --symbol <symbol>         Trading pair, e.g. BTC/USDT
  --timeframe <tf>          Candle timeframe, e.g. 1m, 1h, 1d
  --limit <n>               Number of candles to fetch
  --length <n>              Random walk length
  --seed <n>                Random walk seed
  --start <price>           Random walk start price
  --volatility <v>          Random walk step standard deviation
  --drift <d>               Random walk drift per step
  --undefinedGain <policy>  zero | throw, when noise and variance are both 0
  --format <fmt>            csv | json | summary
  --out <path>              Write output to a file instead of stdout
  --configDir <path>        Custom config directory
  --envPath <path>          Extra .env file
  --help                    Show this message
`;

/**
 * Writes to stdout, or to `out` resolved against `cwd`. Returns the path
 * written, if any.
 */
export const writeOutput = (
	text: string,
	out: string | undefined,
	cwd: string = process.cwd()
): string | undefined => {
	if (!out) {
		process.stdout.write(`${text}\n`);
		return undefined;
	}
	const outputPath = path.resolve(cwd, out);
	fs.mkdirSync(path.dirname(outputPath), { recursive: true });
	fs.writeFileSync(outputPath, `${text}\n`);
	const relative = path.relative(cwd, outputPath) || outputPath;
	console.error(`Forecast saved to ${relative}`);
	return outputPath;
};

export const main = async (
	argv: string[],
	deps: RunForecastDeps = {}
): Promise<void> => {
	const argMap = parseCliArgs(argv);
	if (argMap.help) {
		console.log(USAGE);
		return;
	}

	const options = resolveCliOptions(argMap);
	const loaded = loadForecastConfig(options.load);
	const logger = deps.moduleLogger ?? createLogger("forecast-cli");
	logger.debug("config_loaded", { ...getConfigMetadata(loaded) });

	const config = applyOverrides(loaded, options.overrides);
	const result = await runForecast(config, { ...deps, moduleLogger: logger });
	writeOutput(renderForecast(result, config.format), options.out);
};

export const handleCliError = (error: unknown): void => {
	console.error(
		"Forecast failed:",
		error instanceof Error ? error.message : String(error)
	);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
};
