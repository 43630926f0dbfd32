import fs from "node:fs";
import path from "node:path";
import type { BacktestConfig } from "@tickloop/core";
import type { BacktestRunResult } from "@tickloop/backtest-core";
import { formatEquityCurveCsv } from "@tickloop/metrics";

export interface PersistedFiles {
	jsonPath: string;
	csvPath: string;
}

const safeName = (value: string): string => value.replace(/[^\w.-]/g, "");

/**
 * Writes the full run as JSON and the equity curve as CSV, side by side,
 * under one timestamped base name.
 */
export const persistBacktestResult = (
	result: BacktestRunResult,
	config: BacktestConfig,
	outputDir: string,
	now: Date = new Date()
): PersistedFiles => {
	const stamp = now.toISOString().replace(/[:.]/g, "-");
	const baseName = [
		safeName(config.strategy.id),
		config.symbols.map(safeName).join("_"),
		stamp,
	].join("-");
	fs.mkdirSync(outputDir, { recursive: true });

	const jsonPath = path.join(outputDir, `${baseName}.json`);
	const payload = {
		...result,
		metadata: {
			strategy: config.strategy,
			symbols: config.symbols,
			start: config.start ? new Date(config.start).toISOString() : null,
			end: config.end ? new Date(config.end).toISOString() : null,
			initialCapital: config.initialCapital,
			smoothingWindow: config.smoothingWindow,
			frequency: config.frequency,
		},
	};
	fs.writeFileSync(jsonPath, JSON.stringify(payload, null, 2));

	const csvPath = path.join(outputDir, `${baseName}.csv`);
	fs.writeFileSync(csvPath, `${formatEquityCurveCsv(result.performance.equityCurve)}\n`);

	return { jsonPath, csvPath };
};
