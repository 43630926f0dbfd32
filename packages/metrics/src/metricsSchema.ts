import type { Timestamp } from "@tickloop/core";

export interface EquityCurvePoint {
	timestamp: Timestamp;
	/** Portfolio total at the end of the tick. */
	total: number;
	/** Period return against the previous row; 0 on the first row. */
	returns: number;
	/** Growth of one unit of capital. */
	equityCurve: number;
	/** Fractional decline from the running peak of `equityCurve`. */
	drawdown: number;
}

export interface PerformanceSummary {
	totalReturn: number;
	sharpeRatio: number;
	maxDrawdown: number;
	/** Longest run of consecutive ticks spent below a prior peak. */
	drawdownDuration: number;
	finalEquity: number;
	periods: number;
	complete: boolean;
}

export interface PerformanceReport {
	equityCurve: EquityCurvePoint[];
	summary: PerformanceSummary;
}

export type SummaryStat = [label: string, value: string];
