import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import process from "node:process";
import type { ModuleLogger } from "@pricecast/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { USAGE, handleCliError, main, writeOutput } from "./cli";

const silentLogger: ModuleLogger = {
	log: () => undefined,
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

describe("forecast CLI", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pricecast-cli-"));
	});

	afterEach(() => {
		vi.restoreAllMocks();
		fs.rmSync(tempDir, { recursive: true, force: true });
	});

	it("writes output into nested directories relative to cwd", () => {
		const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const written = writeOutput("a,b\n1,2", "runs/today/out.csv", tempDir);

		const expected = path.join(tempDir, "runs", "today", "out.csv");
		expect(written).toBe(expected);
		expect(fs.readFileSync(expected, "utf-8")).toBe("a,b\n1,2\n");
		expect(errorSpy).toHaveBeenCalledWith(
			`Forecast saved to ${path.join("runs", "today", "out.csv")}`
		);
	});

	it("writes to stdout without --out", () => {
		const stdoutSpy = vi
			.spyOn(process.stdout, "write")
			.mockImplementation(() => true);
		expect(writeOutput("hello", undefined, tempDir)).toBeUndefined();
		expect(stdoutSpy).toHaveBeenCalledWith("hello\n");
	});

	it("prints usage for --help", async () => {
		const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		await main(["--help"]);
		expect(logSpy).toHaveBeenCalledWith(USAGE);
	});

	it("runs a file forecast end to end into --out", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		const configDir = path.join(tempDir, "config");
		fs.mkdirSync(path.join(configDir, "forecast"), { recursive: true });
		fs.writeFileSync(
			path.join(configDir, "forecast", "plain.json"),
			JSON.stringify({ format: "summary" })
		);
		const seriesPath = path.join(tempDir, "closes.txt");
		fs.writeFileSync(seriesPath, "4\n4\n4\n");
		const outPath = path.join(tempDir, "forecast.csv");

		await main(
			[
				"--configDir",
				configDir,
				"--profile",
				"plain",
				seriesPath,
				"--format",
				"csv",
				"--out",
				outPath,
			],
			{ moduleLogger: silentLogger }
		);

		expect(fs.readFileSync(outPath, "utf-8")).toBe(
			"index,price,forecast,errorVariance\n0,4,4,0\n1,4,4,0\n2,4,4,0\n"
		);
	});

	it("reports a failure and sets a non-zero exit code", () => {
		const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const previousExitCode = process.exitCode;
		const previousDebug = process.env.DEBUG;
		delete process.env.DEBUG;
		try {
			handleCliError(new Error("No candles returned for ETH/USDT 1h"));
			expect(process.exitCode).toBe(1);
			expect(errorSpy).toHaveBeenCalledTimes(1);
			expect(errorSpy).toHaveBeenCalledWith(
				"Forecast failed:",
				"No candles returned for ETH/USDT 1h"
			);
		} finally {
			process.exitCode = previousExitCode;
			if (previousDebug !== undefined) {
				process.env.DEBUG = previousDebug;
			}
		}
	});

	it("rejects a conflicting file argument before loading any config", async () => {
		await expect(main(["a.csv", "--file", "b.csv"])).rejects.toThrow(
			"Series file given twice: a.csv and --file b.csv"
		);
	});
});
