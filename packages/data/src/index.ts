export * from "./types";
export { fetchCandleWindow } from "./historical";
export { mapCcxtCandleToCandle } from "./utils/ccxtMapper";
export { mulberry32, gaussian } from "./utils/random";
export type { RandomSource } from "./utils/random";
export { generateRandomWalk, RandomWalkSeriesSource } from "./randomWalk";
export type { RandomWalkOptions } from "./randomWalk";
export { FileSeriesSource, parseSeriesJson, parseSeriesText } from "./fileSeries";
export { ExchangeSeriesSource } from "./exchangeSeries";
export type { ExchangeSeriesOptions } from "./exchangeSeries";
export {
	CcxtMarketDataClient,
	SUPPORTED_EXCHANGES,
	isSupportedExchangeId,
} from "./ccxtMarketDataClient";
export type { SupportedExchangeId } from "./ccxtMarketDataClient";
export { createSeriesSource } from "./createSeriesSource";
export type { SeriesSourceDeps } from "./createSeriesSource";
