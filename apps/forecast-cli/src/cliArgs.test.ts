import { describe, it, expect } from "vitest";
import { parseCliArgs, readFlag, readNumberArg, readStringArg } from "./cliArgs";

describe("forecast CLI arg parsing", () => {
	it("captures flags with a space", () => {
		const args = parseCliArgs(["--source", "exchange", "--symbol", "ETH/USDT"]);
		expect(args.source).toBe("exchange");
		expect(args.symbol).toBe("ETH/USDT");
	});

	it("captures flags with equals syntax", () => {
		const args = parseCliArgs(["--timeframe=15m", "--limit=300"]);
		expect(args.timeframe).toBe("15m");
		expect(args.limit).toBe("300");
	});

	it("treats a flag without a value as boolean", () => {
		const args = parseCliArgs(["--help", "--format", "json"]);
		expect(args.help).toBe(true);
		expect(args.format).toBe("json");
	});

	it("reads a bare path as a file source", () => {
		expect(parseCliArgs(["closes.csv"])).toEqual({
			file: "closes.csv",
			source: "file",
		});
	});

	it("keeps an explicit source alongside a bare path", () => {
		expect(parseCliArgs(["closes.csv", "--source", "random-walk"])).toEqual({
			file: "closes.csv",
			source: "random-walk",
		});
	});

	it("rejects a bare path alongside --file", () => {
		expect(() => parseCliArgs(["closes.csv", "--file", "other.csv"])).toThrow(
			"Series file given twice: closes.csv and --file other.csv"
		);
	});

	it("rejects more than one bare argument", () => {
		expect(() => parseCliArgs(["a.csv", "b.csv"])).toThrow(
			"Unexpected argument: b.csv"
		);
	});

	it("skips the npm argument separator", () => {
		expect(parseCliArgs(["--", "--seed", "3"])).toEqual({ seed: "3" });
	});
});

describe("typed arg readers", () => {
	it("parses numbers and rejects garbage", () => {
		const args = parseCliArgs(["--seed", "42", "--length", "ten"]);
		expect(readNumberArg(args, "seed")).toBe(42);
		expect(readNumberArg(args, "missing")).toBeUndefined();
		expect(() => readNumberArg(args, "length")).toThrow(
			"Invalid numeric value for --length: ten"
		);
	});

	it("requires a value for string options", () => {
		const args = parseCliArgs(["--out"]);
		expect(() => readStringArg(args, "out")).toThrow("Missing value for --out");
	});

	it("reads boolean flags", () => {
		const args = parseCliArgs(["--json", "--debug=true"]);
		expect(readFlag(args, "json")).toBe(true);
		expect(readFlag(args, "debug")).toBe(true);
		expect(readFlag(args, "quiet")).toBe(false);
	});
});
