import type { ForecastConfig } from "@pricecast/core";
import { CcxtMarketDataClient } from "./ccxtMarketDataClient";
import { ExchangeSeriesSource } from "./exchangeSeries";
import { FileSeriesSource } from "./fileSeries";
import { RandomWalkSeriesSource } from "./randomWalk";
import type { DataProviderLogger, MarketDataClient, SeriesSource } from "./types";

export interface SeriesSourceDeps {
	createClient?: (exchangeId: string) => MarketDataClient;
	logger?: DataProviderLogger;
	now?: () => number;
}

export const createSeriesSource = (
	config: ForecastConfig,
	deps: SeriesSourceDeps = {}
): SeriesSource => {
	switch (config.source) {
		case "random-walk":
			return new RandomWalkSeriesSource(config.randomWalk);
		case "file": {
			if (!config.file) {
				throw new Error('Source "file" requires a file path (--file <path>)');
			}
			return new FileSeriesSource(config.file);
		}
		case "exchange": {
			const createClient =
				deps.createClient ?? ((id: string) => CcxtMarketDataClient.create(id));
			return new ExchangeSeriesSource({
				client: createClient(config.exchange.id),
				symbol: config.exchange.symbol,
				timeframe: config.exchange.timeframe,
				limit: config.exchange.limit,
				now: deps.now,
				logger: deps.logger,
			});
		}
	}
};
