import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";

// The filter and the metrics built on it stay pure: no I/O, no exchange or
// config packages.
const FORBIDDEN =
	/from\s+["'](ccxt|dotenv|node:[\w/]+|@pricecast\/(core|data|forecast-cli))["']/;
const FORBIDDEN_DEP = /^(ccxt|dotenv|@pricecast\/(core|data|forecast-cli))$/;
const TARGETS = [
	{ name: "models-quant", dir: path.join(__dirname, "..") },
	{ name: "metrics", dir: path.join(__dirname, "../../../metrics/src") },
];
const PACKAGE_JSONS = [
	path.join(__dirname, "../../package.json"),
	path.join(__dirname, "../../../metrics/package.json"),
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const shouldScan = (file: string): boolean => {
	const base = path.basename(file);
	if (base.startsWith(".")) return false;
	if (base.endsWith(".test.ts")) return false;
	return base.endsWith(".ts");
};

const walkFiles = (root: string): string[] => {
	const results: string[] = [];
	const stack = [root];
	while (stack.length) {
		const current = stack.pop();
		if (current === undefined) break;
		const stat = fs.statSync(current);
		if (stat.isDirectory()) {
			for (const entry of fs.readdirSync(current)) {
				if (entry === "node_modules" || entry === "dist") continue;
				stack.push(path.join(current, entry));
			}
			continue;
		}
		if (shouldScan(current)) {
			results.push(current);
		}
	}
	return results;
};

describe("filter import boundaries", () => {
	it("models-quant/metrics sources import no I/O or config modules", () => {
		const offenders: string[] = [];
		for (const target of TARGETS) {
			const files = walkFiles(target.dir);
			expect(files.length).toBeGreaterThan(0);
			for (const file of files) {
				const content = fs.readFileSync(file, "utf8");
				if (FORBIDDEN.test(content)) {
					offenders.push(`${target.name}:${path.relative(target.dir, file)}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});

	it("models-quant/metrics package.json declare no I/O dependencies", () => {
		const offenders: string[] = [];
		for (const pkgPath of PACKAGE_JSONS) {
			const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
			if (!isRecord(pkg)) continue;
			const deps = {
				...(isRecord(pkg.dependencies) ? pkg.dependencies : {}),
				...(isRecord(pkg.devDependencies) ? pkg.devDependencies : {}),
			};
			for (const dep of Object.keys(deps)) {
				if (FORBIDDEN_DEP.test(dep)) {
					offenders.push(`${path.basename(path.dirname(pkgPath))}:${dep}`);
				}
			}
		}
		expect(offenders).toEqual([]);
	});
});
