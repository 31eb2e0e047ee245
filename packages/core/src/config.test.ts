import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	DEFAULT_EXCHANGE_SOURCE,
	DEFAULT_RANDOM_WALK,
	getConfigMetadata,
	loadForecastConfig,
	parseForecastConfig,
} from "./config";

const ENV_KEYS = [
	"PRICECAST_PROFILE",
	"PRICECAST_SOURCE",
	"PRICECAST_EXCHANGE",
	"PRICECAST_SYMBOL",
	"PRICECAST_TIMEFRAME",
];

const writeProfile = (dir: string, name: string, body: unknown): string => {
	const forecastDir = path.join(dir, "forecast");
	fs.mkdirSync(forecastDir, { recursive: true });
	const filePath = path.join(forecastDir, `${name}.json`);
	fs.writeFileSync(filePath, JSON.stringify(body));
	return filePath;
};

describe("parseForecastConfig", () => {
	it("fills missing sections with defaults", () => {
		const config = parseForecastConfig({}, "empty");
		expect(config).toEqual({
			profile: "empty",
			source: "random-walk",
			file: undefined,
			undefinedGainPolicy: "zero",
			format: "csv",
			randomWalk: DEFAULT_RANDOM_WALK,
			exchange: DEFAULT_EXCHANGE_SOURCE,
		});
	});

	it("rejects unknown sources and policies", () => {
		expect(() => parseForecastConfig({ source: "socket" }, "bad")).toThrow(
			"Invalid source: socket. Expected one of random-walk, file, exchange"
		);
		expect(() =>
			parseForecastConfig({ undefinedGainPolicy: "nan" }, "bad")
		).toThrow(/Invalid undefinedGainPolicy/);
	});

	it("rejects malformed numeric fields", () => {
		expect(() =>
			parseForecastConfig({ randomWalk: { length: 0 } }, "bad")
		).toThrow("Config field randomWalk.length must be a positive integer");
		expect(() =>
			parseForecastConfig({ randomWalk: { volatility: -1 } }, "bad")
		).toThrow("Config field randomWalk.volatility must be >= 0");
		expect(() =>
			parseForecastConfig({ randomWalk: { start: "100" } }, "bad")
		).toThrow("Config field randomWalk.start must be a finite number");
	});

	it("rejects invalid timeframes", () => {
		expect(() =>
			parseForecastConfig({ exchange: { timeframe: "5x" } }, "bad")
		).toThrow(/Invalid timeframe format/);
	});

	it("rejects a non-object document", () => {
		expect(() => parseForecastConfig([1, 2], "list")).toThrow(
			"Forecast config list must be a JSON object"
		);
	});
});

describe("loadForecastConfig", () => {
	let configDir: string;

	beforeEach(() => {
		configDir = fs.mkdtempSync(path.join(os.tmpdir(), "pricecast-config-"));
		for (const key of ENV_KEYS) {
			delete process.env[key];
		}
	});

	afterEach(() => {
		fs.rmSync(configDir, { recursive: true, force: true });
		for (const key of ENV_KEYS) {
			delete process.env[key];
		}
	});

	it("loads a named profile and records where it came from", () => {
		const filePath = writeProfile(configDir, "walk", {
			source: "random-walk",
			randomWalk: { length: 10, seed: 7 },
		});
		const config = loadForecastConfig({ configDir, profile: "walk" });
		expect(config.randomWalk).toEqual({
			...DEFAULT_RANDOM_WALK,
			length: 10,
			seed: 7,
		});
		expect(getConfigMetadata(config)).toEqual({
			path: filePath,
			profile: "walk",
		});
	});

	it("lets environment variables override the profile", () => {
		writeProfile(configDir, "default", {
			source: "random-walk",
			exchange: { id: "binance", symbol: "BTC/USDT", timeframe: "1h" },
		});
		process.env.PRICECAST_SOURCE = "exchange";
		process.env.PRICECAST_SYMBOL = "ETH/USDT";
		process.env.PRICECAST_TIMEFRAME = "15m";
		const config = loadForecastConfig({ configDir });
		expect(config.source).toBe("exchange");
		expect(config.exchange).toEqual({
			id: "binance",
			symbol: "ETH/USDT",
			timeframe: "15m",
			limit: DEFAULT_EXCHANGE_SOURCE.limit,
		});
	});

	it("throws when the profile does not exist", () => {
		expect(() =>
			loadForecastConfig({ configDir, profile: "missing" })
		).toThrowError(/Forecast config not found/);
	});
});
