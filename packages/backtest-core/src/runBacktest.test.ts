import { describe, expect, it } from "vitest";
import type { BacktestConfig, StrategySelection } from "@tickloop/core";
import type { RawBar } from "@tickloop/data";
import { zeroCommission } from "@tickloop/execution-engine";
import { ScriptedStrategy } from "@tickloop/strategy-engine";
import { runBacktest } from "./runBacktest";

const DAY = 86_400_000;
const baseTimestamp = Date.UTC(2024, 0, 1);

const flatBars = (count: number, close: number): RawBar[] =>
	Array.from({ length: count }, (_, idx) => ({
		timestamp: baseTimestamp + idx * DAY,
		open: close,
		high: close,
		low: close,
		close,
		volume: 10_000,
	}));

const buildConfig = (strategy: StrategySelection): BacktestConfig => ({
	symbols: ["AAA"],
	initialCapital: 1_000_000,
	frequency: 252,
	smoothingWindow: 5,
	exchange: "SIMULATED",
	strategy,
});

const longOnce: StrategySelection = {
	id: "scripted",
	params: { script: [{ tick: 1, symbol: "AAA", direction: "LONG", quantity: 500 }] },
};

describe("runBacktest", () => {
	it("replays every tick and books the smoothed fills", () => {
		const result = runBacktest({
			config: buildConfig(longOnce),
			series: { AAA: flatBars(6, 10) },
		});

		expect(result.status).toBe("completed");
		expect(result.complete).toBe(true);
		expect(result.error).toBeUndefined();
		expect(result.stats).toEqual({ ticks: 6, signals: 1, orders: 5, fills: 5 });
		expect(result.positions.map((row) => row.positions.AAA)).toEqual([
			0, 100, 200, 300, 400, 500, 500,
		]);
		expect(result.fills.every((fill) => fill.exchange === "SIMULATED")).toBe(true);

		const last = result.holdings.at(-1);
		expect(last?.commission).toBeCloseTo(6.5, 10);
		expect(last?.cash).toBeCloseTo(1_000_000 - 5000 - 6.5, 6);
		expect(last?.total).toBeCloseTo(1_000_000 - 6.5, 6);
		expect(result.performance.equityCurve).toHaveLength(7);
		expect(result.performance.summary.complete).toBe(true);
	});

	it("dates the capital-only row before the first tick", () => {
		const series = { AAA: flatBars(3, 10) };
		const unbounded = runBacktest({ config: buildConfig(longOnce), series });
		expect(unbounded.holdings.slice(0, 2).map((row) => row.timestamp)).toEqual([
			baseTimestamp - DAY,
			baseTimestamp,
		]);

		const onFirstTick = runBacktest({
			config: { ...buildConfig(longOnce), start: baseTimestamp },
			series,
		});
		expect(onFirstTick.holdings[0].timestamp).toBe(baseTimestamp - DAY);

		const earlier = runBacktest({
			config: { ...buildConfig(longOnce), start: baseTimestamp - 3 * DAY },
			series,
		});
		expect(earlier.positions[0].timestamp).toBe(baseTimestamp - 3 * DAY);
	});

	it("produces identical histories for identical inputs", () => {
		const options = {
			config: buildConfig({
				id: "moving_average_cross",
				params: { shortWindow: 2, longWindow: 3, quantity: 10 },
			}),
			series: {
				AAA: [10, 10, 10, 12, 13, 8, 5, 6, 9, 12].map((close, idx) => ({
					timestamp: baseTimestamp + idx * DAY,
					open: close,
					high: close,
					low: close,
					close,
					volume: 1,
				})),
			},
		};
		const first = runBacktest(options);
		const second = runBacktest(options);

		expect(first.status).toBe("completed");
		expect(first.fills.length).toBeGreaterThan(0);
		expect(second.holdings).toEqual(first.holdings);
		expect(second.rawPositions).toEqual(first.rawPositions);
	});

	it("stops on an error and marks the partial output incomplete", () => {
		const result = runBacktest({
			config: buildConfig({
				id: "scripted",
				params: { script: [{ tick: 3, symbol: "ZZZ", direction: "LONG" }] },
			}),
			series: { AAA: flatBars(5, 10) },
		});

		expect(result.status).toBe("aborted");
		expect(result.complete).toBe(false);
		expect(result.error).toEqual({
			name: "UnknownInstrumentError",
			code: "UNKNOWN_INSTRUMENT",
			message: "Symbol ZZZ is not available in the historical data set",
		});
		expect(result.stats.ticks).toBe(3);
		// opening row plus the two ticks that finished
		expect(result.holdings).toHaveLength(3);
		expect(result.performance.summary.complete).toBe(false);
	});

	it("reports a configuration failure before any tick", () => {
		const result = runBacktest({
			config: buildConfig({ id: "unknown", params: {} }),
			series: { AAA: flatBars(2, 10) },
		});

		expect(result.status).toBe("aborted");
		expect(result.error?.code).toBe("CONFIG_ERROR");
		expect(result.holdings).toEqual([]);
		expect(result.stats).toEqual({ ticks: 0, signals: 0, orders: 0, fills: 0 });
	});

	it("accepts an injected strategy and commission model", () => {
		const result = runBacktest({
			config: buildConfig({ id: "ignored", params: {} }),
			series: { AAA: flatBars(1, 10) },
			commission: zeroCommission,
			strategyFactory: (deps) =>
				new ScriptedStrategy(deps, {
					id: "custom",
					script: [{ tick: 1, symbol: "AAA", direction: "LONG", quantity: 5 }],
				}),
		});

		expect(result.status).toBe("completed");
		expect(result.fills.map((fill) => [fill.quantity, fill.commission])).toEqual([
			[1, 0],
		]);
		expect(result.holdings.at(-1)?.total).toBe(1_000_000);
	});
});
