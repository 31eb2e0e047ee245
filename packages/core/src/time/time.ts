/**
 * Pure time utilities. All functions operate on UTC epoch milliseconds.
 */
import { DAY_MS, HOUR_MS, MINUTE_MS } from "./constants";

export type TimeframeUnit = "m" | "h" | "d";

export interface ParsedTimeframe {
	unit: TimeframeUnit;
	n: number;
	ms: number;
}

const UNIT_MS: Record<TimeframeUnit, number> = {
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
};

const isTimeframeUnit = (value: string): value is TimeframeUnit =>
	value in UNIT_MS;

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(/^(\d+)([a-z])$/);
	if (!match || !isTimeframeUnit(match[2])) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	const unit = match[2];
	return { unit, n, ms: n * UNIT_MS[unit] };
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Bucket a timestamp to the start of its timeframe period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};
