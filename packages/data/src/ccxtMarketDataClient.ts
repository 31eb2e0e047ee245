import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import type { Candle, MarketDataClient } from "@pricecast/core";
import { mapCcxtCandleToCandle } from "./utils/ccxtMapper";

type ExchangeFactory = (config: Record<string, unknown>) => Exchange;

const EXCHANGE_FACTORIES = {
	binance: (config) => new ccxt.binance(config),
	mexc: (config) => new ccxt.mexc(config),
} satisfies Record<string, ExchangeFactory>;

export type SupportedExchangeId = keyof typeof EXCHANGE_FACTORIES;

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

export const isSupportedExchangeId = (id: string): id is SupportedExchangeId =>
	Object.hasOwn(EXCHANGE_FACTORIES, id);

/**
 * Public market data only: no credentials are passed to the exchange.
 */
export class CcxtMarketDataClient implements MarketDataClient {
	private constructor(
		private readonly exchange: Exchange,
		readonly id: SupportedExchangeId
	) {}

	static create(id: string): CcxtMarketDataClient {
		const normalized = id.toLowerCase();
		if (!isSupportedExchangeId(normalized)) {
			throw new Error(
				`Unsupported exchange "${id}". Expected one of ${SUPPORTED_EXCHANGES.join(", ")}`
			);
		}
		const exchange = EXCHANGE_FACTORIES[normalized]({
			enableRateLimit: true,
			options: { defaultType: "spot" },
		});
		return new CcxtMarketDataClient(exchange, normalized);
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<Candle[]> {
		const rows = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		return rows.map((row) => mapCcxtCandleToCandle(row, symbol, timeframe));
	}
}
