import { DEFAULT_FREQUENCY, type HoldingsSnapshot } from "@tickloop/core";
import type {
	EquityCurvePoint,
	PerformanceReport,
	PerformanceSummary,
	SummaryStat,
} from "./metricsSchema";

export interface CalcPerformanceOptions {
	/** Return periods per year used to annualize Sharpe. */
	periods?: number;
	/** False when the run that produced the holdings was aborted. */
	complete?: boolean;
}

export const createEquityCurve = (
	holdings: readonly HoldingsSnapshot[]
): EquityCurvePoint[] => {
	const curve: EquityCurvePoint[] = [];
	let equity = 1;
	let peak = 1;
	holdings.forEach((row, idx) => {
		const prev = idx > 0 ? holdings[idx - 1].total : row.total;
		const returns = idx > 0 && prev !== 0 ? row.total / prev - 1 : 0;
		equity *= 1 + returns;
		peak = Math.max(peak, equity);
		curve.push({
			timestamp: row.timestamp,
			total: row.total,
			returns,
			equityCurve: equity,
			drawdown: peak > 0 ? (peak - equity) / peak : 0,
		});
	});
	return curve;
};

export const calculatePerformance = (
	holdings: readonly HoldingsSnapshot[],
	options: CalcPerformanceOptions = {}
): PerformanceReport => {
	const periods = options.periods ?? DEFAULT_FREQUENCY;
	const equityCurve = createEquityCurve(holdings);
	const last = equityCurve.at(-1);

	const summary: PerformanceSummary = {
		totalReturn: last ? last.equityCurve - 1 : 0,
		sharpeRatio: computeSharpe(
			equityCurve.map((point) => point.returns),
			periods
		),
		maxDrawdown: equityCurve.reduce(
			(max, point) => Math.max(max, point.drawdown),
			0
		),
		drawdownDuration: longestDrawdown(equityCurve),
		finalEquity: last?.total ?? 0,
		periods,
		complete: options.complete ?? true,
	};

	return { equityCurve, summary };
};

export const computeSharpe = (returns: readonly number[], periods: number): number => {
	if (returns.length < 2 || periods <= 0) {
		return 0;
	}
	const mean = returns.reduce((sum, value) => sum + value, 0) / returns.length;
	const std = standardDeviation(returns);
	return std === 0 ? 0 : Math.sqrt(periods) * (mean / std);
};

export const standardDeviation = (values: readonly number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
	const variance =
		values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
	return Math.sqrt(variance);
};

const longestDrawdown = (curve: readonly EquityCurvePoint[]): number => {
	let longest = 0;
	let current = 0;
	for (const point of curve) {
		current = point.drawdown > 0 ? current + 1 : 0;
		longest = Math.max(longest, current);
	}
	return longest;
};

const percent = (value: number): string => `${(value * 100).toFixed(2)}%`;

export const formatSummaryStats = (summary: PerformanceSummary): SummaryStat[] => [
	["Total Return", percent(summary.totalReturn)],
	["Sharpe Ratio", summary.sharpeRatio.toFixed(2)],
	["Max Drawdown", percent(summary.maxDrawdown)],
	["Drawdown Duration", String(summary.drawdownDuration)],
];
