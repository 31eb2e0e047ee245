import type { Candle } from "@pricecast/core";
import { timeframeToMs } from "@pricecast/core";
import type { CandleWindowRequest } from "./types";

const DEFAULT_BATCH_SIZE = 500;

/**
 * Pages through `fetchOHLCV` from `startTimestamp` to `endTimestamp`,
 * dropping duplicate timestamps. Stops at the end of the window, on an empty
 * page, or once `limit` candles have been collected.
 */
export const fetchCandleWindow = async (
	request: CandleWindowRequest
): Promise<Candle[]> => {
	const batchSize = Math.max(request.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const timeframeMs = timeframeToMs(request.timeframe);
	const limit =
		typeof request.limit === "number" && request.limit > 0
			? request.limit
			: Number.POSITIVE_INFINITY;

	const result: Candle[] = [];
	const seenTimestamps = new Set<number>();
	let since = Math.max(0, request.startTimestamp);

	while (since <= request.endTimestamp && result.length < limit) {
		const batch = await request.client.fetchOHLCV(
			request.symbol,
			request.timeframe,
			Math.min(batchSize, limit - result.length),
			since
		);
		if (!batch.length) {
			break;
		}

		for (const candle of batch) {
			if (candle.timestamp > request.endTimestamp) {
				return result;
			}
			if (candle.timestamp < since || seenTimestamps.has(candle.timestamp)) {
				continue;
			}
			result.push(candle);
			seenTimestamps.add(candle.timestamp);
			if (result.length >= limit) {
				return result;
			}
		}

		// Always advance, so a page of stale candles cannot stall the loop.
		const last = batch[batch.length - 1];
		since = Math.max(last.timestamp + timeframeMs, since + timeframeMs);
	}

	return result;
};
