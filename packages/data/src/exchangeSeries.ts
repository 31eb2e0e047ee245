import { bucketTimestamp, timeframeToMs } from "@pricecast/core";
import { fetchCandleWindow } from "./historical";
import type { DataProviderLogger, MarketDataClient, SeriesSource } from "./types";

export interface ExchangeSeriesOptions {
	client: MarketDataClient;
	symbol: string;
	timeframe: string;
	limit: number;
	now?: () => number;
	logger?: DataProviderLogger;
}

/**
 * Closing prices of the most recent `limit` candles, oldest first. The
 * window ends at the candle containing `now`, which may still be open.
 */
export class ExchangeSeriesSource implements SeriesSource {
	constructor(private readonly options: ExchangeSeriesOptions) {
		if (!Number.isInteger(options.limit) || options.limit < 1) {
			throw new Error(
				`Exchange series limit must be a positive integer, got ${options.limit}`
			);
		}
	}

	describe(): string {
		const { symbol, timeframe, limit } = this.options;
		return `exchange(${symbol} ${timeframe} x${limit})`;
	}

	async load(): Promise<number[]> {
		const { client, symbol, timeframe, limit, logger } = this.options;
		const now = this.options.now ?? Date.now;
		const timeframeMs = timeframeToMs(timeframe);
		const endTimestamp = bucketTimestamp(now(), timeframeMs);
		const startTimestamp = Math.max(0, endTimestamp - (limit - 1) * timeframeMs);

		const candles = await fetchCandleWindow({
			client,
			symbol,
			timeframe,
			startTimestamp,
			endTimestamp,
			limit,
		});
		if (!candles.length) {
			throw new Error(`No candles returned for ${symbol} ${timeframe}`);
		}

		const ordered = [...candles].sort((a, b) => a.timestamp - b.timestamp);
		logger?.info?.("exchange_series_loaded", {
			symbol,
			timeframe,
			candles: ordered.length,
			first: ordered[0].timestamp,
			last: ordered[ordered.length - 1].timestamp,
		});
		return ordered.map((candle) => candle.close);
	}
}
