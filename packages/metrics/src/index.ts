export { buildChartSeries } from "./chartSeries";
export type { ChartSeries } from "./chartSeries";
export { summarizeForecast } from "./forecastSummary";
export type { ForecastSummary } from "./forecastSummary";
export { formatForecastCsv } from "./formatCSV";
export type { FormatCsvOptions } from "./formatCSV";
