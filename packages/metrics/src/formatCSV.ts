import type { EquityCurvePoint } from "./metricsSchema";

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

export const EQUITY_CURVE_COLUMNS = [
	"timestamp",
	"total",
	"returns",
	"equity_curve",
	"drawdown",
] as const;

type EquityCurveColumn = (typeof EQUITY_CURVE_COLUMNS)[number];

const toRow = (point: EquityCurvePoint): Record<EquityCurveColumn, unknown> => ({
	timestamp: new Date(point.timestamp).toISOString(),
	total: point.total,
	returns: point.returns,
	equity_curve: point.equityCurve,
	drawdown: point.drawdown,
});

export const formatEquityCurveCsv = (
	curve: readonly EquityCurvePoint[],
	options: FormatCsvOptions = {}
): string => {
	const lines: string[] = [];
	if (options.includeHeader ?? true) {
		lines.push(EQUITY_CURVE_COLUMNS.join(","));
	}
	for (const point of curve) {
		const row = toRow(point);
		lines.push(
			EQUITY_CURVE_COLUMNS.map((column) => formatValue(row[column])).join(",")
		);
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (value.includes(",")) {
			return `"${value}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
