export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}
