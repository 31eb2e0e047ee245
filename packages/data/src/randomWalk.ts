import type { SeriesSource } from "./types";
import { gaussian, mulberry32 } from "./utils/random";

export interface RandomWalkOptions {
	length: number;
	start: number;
	volatility: number;
	drift?: number;
	seed: number;
}

export const generateRandomWalk = (options: RandomWalkOptions): number[] => {
	const { length, start, volatility, seed } = options;
	const drift = options.drift ?? 0;
	if (!Number.isInteger(length) || length < 1) {
		throw new Error(`Random walk length must be a positive integer, got ${length}`);
	}
	if (!Number.isFinite(start)) {
		throw new Error(`Random walk start must be finite, got ${start}`);
	}
	if (!Number.isFinite(volatility) || volatility < 0) {
		throw new Error(`Random walk volatility must be >= 0, got ${volatility}`);
	}
	if (!Number.isFinite(drift)) {
		throw new Error(`Random walk drift must be finite, got ${drift}`);
	}

	const random = mulberry32(seed);
	const path: number[] = [start];
	for (let i = 1; i < length; i += 1) {
		path.push(path[i - 1] + drift + volatility * gaussian(random));
	}
	return path;
};

export class RandomWalkSeriesSource implements SeriesSource {
	constructor(private readonly options: RandomWalkOptions) {}

	describe(): string {
		const { length, start, volatility, seed } = this.options;
		return `random-walk(length=${length}, start=${start}, volatility=${volatility}, seed=${seed})`;
	}

	async load(): Promise<number[]> {
		return generateRandomWalk(this.options);
	}
}
