import type { Candle } from "../types";

/**
 * Read-only market data access. Series sources only ever need candles, so
 * nothing here requires trading permissions.
 */
export interface MarketDataClient {
	/**
	 * Fetch OHLCV candle data for a symbol and timeframe.
	 * @param symbol - Trading pair symbol (e.g., "BTC/USDT")
	 * @param timeframe - Timeframe string (e.g., "1m", "5m", "1h")
	 * @param limit - Maximum number of candles to fetch
	 * @param since - Optional timestamp to fetch candles from
	 * @returns Array of candles in chronological order
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Candle[]>;
}
