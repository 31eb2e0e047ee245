import type { FilterState } from "@pricecast/models-quant";

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

export const formatForecastCsv = (
	states: readonly FilterState[],
	options: FormatCsvOptions = {}
): string =>
	toCsv(
		states.map((state, idx) => ({
			index: idx,
			price: state.observed,
			forecast: state.estimate,
			errorVariance: state.errorVariance,
		})),
		options.includeHeader ?? true
	);

const toCsv = (
	rows: Record<string, number>[],
	includeHeader: boolean
): string => {
	if (!rows.length) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

// Non-finite cells are left empty.
const formatValue = (value: number): string =>
	Number.isFinite(value) ? value.toString() : "";
