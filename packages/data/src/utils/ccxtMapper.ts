import type { OHLCV } from "ccxt";
import type { Candle } from "@pricecast/core";

/**
 * Maps a CCXT OHLCV row onto the shared Candle type. Missing cells become 0.
 */
export const mapCcxtCandleToCandle = (
	row: OHLCV,
	symbol: string,
	timeframe: string
): Candle => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		symbol,
		timeframe,
		timestamp: Number(timestamp ?? 0),
		open: Number(open ?? 0),
		high: Number(high ?? 0),
		low: Number(low ?? 0),
		close: Number(close ?? 0),
		volume: Number(volume ?? 0),
	};
};
