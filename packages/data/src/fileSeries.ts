import { readFile } from "node:fs/promises";
import path from "node:path";
import type { SeriesSource } from "./types";

const VALUE_COLUMNS = ["close", "price"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const parseCell = (cell: string, lineNumber: number, label: string): number => {
	const trimmed = cell.trim();
	const value = trimmed.length ? Number(trimmed) : Number.NaN;
	if (!Number.isFinite(value)) {
		throw new Error(`Invalid number "${trimmed}" at line ${lineNumber} of ${label}`);
	}
	return value;
};

/**
 * Parses one value per line, or a CSV whose header names a `close` or
 * `price` column. Blank lines and `#` comments are skipped.
 */
export const parseSeriesText = (text: string, label: string): number[] => {
	const lines = text
		.split(/\r?\n/)
		.map((line, idx) => ({ line: line.trim(), lineNumber: idx + 1 }))
		.filter(({ line }) => line.length > 0 && !line.startsWith("#"));

	if (!lines.length) {
		throw new Error(`Series file ${label} contains no observations`);
	}

	const firstCells = lines[0].line.split(",").map((cell) => cell.trim());
	const hasHeader = firstCells.some(
		(cell) => !cell.length || !Number.isFinite(Number(cell))
	);

	if (!hasHeader) {
		return lines.map(({ line, lineNumber }) => {
			if (line.includes(",")) {
				throw new Error(
					`Expected one value per line at line ${lineNumber} of ${label}; add a header naming the close or price column`
				);
			}
			return parseCell(line, lineNumber, label);
		});
	}

	const headers = firstCells.map((cell) => cell.toLowerCase());
	const column = headers.findIndex((header) => VALUE_COLUMNS.includes(header));
	if (column === -1) {
		throw new Error(
			`Series file ${label} has no ${VALUE_COLUMNS.join(" or ")} column in its header`
		);
	}

	const values = lines.slice(1).map(({ line, lineNumber }) => {
		const cells = line.split(",");
		if (cells.length <= column) {
			throw new Error(`Missing ${headers[column]} value at line ${lineNumber} of ${label}`);
		}
		return parseCell(cells[column], lineNumber, label);
	});
	if (!values.length) {
		throw new Error(`Series file ${label} contains no observations`);
	}
	return values;
};

/**
 * Accepts an array of numbers, or of objects carrying a numeric `close`
 * (falling back to `price`).
 */
export const parseSeriesJson = (raw: unknown, label: string): number[] => {
	if (!Array.isArray(raw)) {
		throw new Error(`Series file ${label} must hold a JSON array`);
	}
	if (!raw.length) {
		throw new Error(`Series file ${label} contains no observations`);
	}
	return raw.map((entry: unknown, idx) => {
		const value = isRecord(entry) ? entry.close ?? entry.price : entry;
		if (typeof value !== "number" || !Number.isFinite(value)) {
			throw new Error(`Invalid series entry at index ${idx} of ${label}`);
		}
		return value;
	});
};

export class FileSeriesSource implements SeriesSource {
	constructor(private readonly filePath: string) {}

	describe(): string {
		return `file(${this.filePath})`;
	}

	async load(): Promise<number[]> {
		const contents = await readFile(this.filePath, "utf-8");
		const label = path.basename(this.filePath);
		if (path.extname(this.filePath).toLowerCase() === ".json") {
			let parsed: unknown;
			try {
				parsed = JSON.parse(contents);
			} catch (error) {
				throw new Error(
					`Invalid JSON in ${label}: ${
						error instanceof Error ? error.message : String(error)
					}`
				);
			}
			return parseSeriesJson(parsed, label);
		}
		return parseSeriesText(contents, label);
	}
}
