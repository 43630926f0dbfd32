export {
	calculatePerformance,
	computeSharpe,
	createEquityCurve,
	formatSummaryStats,
	standardDeviation,
	type CalcPerformanceOptions,
} from "./calcPerformance";
export {
	EQUITY_CURVE_COLUMNS,
	formatEquityCurveCsv,
	type FormatCsvOptions,
} from "./formatCSV";
export type {
	EquityCurvePoint,
	PerformanceReport,
	PerformanceSummary,
	SummaryStat,
} from "./metricsSchema";
