export type { MarketDataClient } from "./MarketDataClient";
