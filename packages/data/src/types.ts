import type { Candle, MarketDataClient } from "@pricecast/core";

export type { MarketDataClient };

export interface DataProviderLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

/**
 * Supplies the ordered observations a forecast runs over. Implementations
 * return at least one finite number or throw.
 */
export interface SeriesSource {
	describe(): string;
	load(): Promise<number[]>;
}

export interface CandleWindowRequest {
	client: MarketDataClient;
	symbol: string;
	timeframe: string;
	startTimestamp: number;
	endTimestamp: number;
	limit?: number;
	batchSize?: number;
}

export type { Candle };
