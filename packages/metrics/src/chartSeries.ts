import type { FilterState } from "@pricecast/models-quant";

/**
 * Aligned columns for a two-line chart ("price" vs "forecast") over a
 * shared index axis.
 */
export interface ChartSeries {
	index: number[];
	price: number[];
	forecast: number[];
}

export const buildChartSeries = (states: readonly FilterState[]): ChartSeries => ({
	index: states.map((_, idx) => idx),
	price: states.map((state) => state.observed),
	forecast: states.map((state) => state.estimate),
});
