import {
	EventQueue,
	createLogger,
	isBacktestError,
	type BacktestConfig,
	type BacktestErrorCode,
	type FillEvent,
	type HoldingsSnapshot,
	type PositionsSnapshot,
	type Timestamp,
} from "@tickloop/core";
import { InMemoryDataSource, type RawSeriesInput } from "@tickloop/data";
import {
	SimulatedExecutionHandler,
	type CommissionModel,
} from "@tickloop/execution-engine";
import { calculatePerformance, type PerformanceReport } from "@tickloop/metrics";
import { Portfolio } from "@tickloop/portfolio";
import {
	createStrategy,
	type Strategy,
	type StrategyDeps,
} from "@tickloop/strategy-engine";
import { Backtest, type BacktestStats } from "./Backtest";

const runLogger = createLogger("backtest");

export type BacktestStatus = "completed" | "aborted";

export interface RunBacktestOptions {
	config: BacktestConfig;
	series: RawSeriesInput;
	commission?: CommissionModel;
	/** Replaces the strategy named by `config.strategy`. */
	strategyFactory?: (deps: StrategyDeps) => Strategy;
}

export interface BacktestFailure {
	name: string;
	message: string;
	code?: BacktestErrorCode;
}

export interface BacktestRunResult {
	status: BacktestStatus;
	/** False when the run stopped early; histories then end at the last completed tick. */
	complete: boolean;
	error?: BacktestFailure;
	stats: BacktestStats;
	holdings: HoldingsSnapshot[];
	rawHoldings: HoldingsSnapshot[];
	positions: PositionsSnapshot[];
	rawPositions: PositionsSnapshot[];
	fills: FillEvent[];
	performance: PerformanceReport;
}

const EMPTY_STATS: BacktestStats = { ticks: 0, signals: 0, orders: 0, fills: 0 };

const toFailure = (error: unknown): BacktestFailure => {
	if (isBacktestError(error)) {
		return { name: error.name, message: error.message, code: error.code };
	}
	if (error instanceof Error) {
		return { name: error.name, message: error.message };
	}
	return { name: "Error", message: String(error) };
};

/**
 * The configured start when it falls before the first tick, otherwise one
 * calendar step before it, so the capital-only row never shares a tick.
 */
const openingTimestamp = (
	start: Timestamp | undefined,
	dataSource: InMemoryDataSource
): Timestamp => {
	const first = dataSource.calendarStart;
	if (start !== undefined && (first === undefined || start < first)) {
		return start;
	}
	return dataSource.openingTimestamp ?? start ?? 0;
};

/**
 * Builds and runs one backtest. Never throws: a failure at any point stops
 * the run and is reported on the result, with whatever history was already
 * recorded marked incomplete.
 */
export const runBacktest = (options: RunBacktestOptions): BacktestRunResult => {
	const { config } = options;
	let portfolio: Portfolio | undefined;
	let backtest: Backtest | undefined;
	let failure: BacktestFailure | undefined;

	runLogger.info("backtest_started", {
		symbols: config.symbols,
		start: config.start ? new Date(config.start).toISOString() : null,
		end: config.end ? new Date(config.end).toISOString() : null,
		strategyId: config.strategy.id,
		initialCapital: config.initialCapital,
		smoothingWindow: config.smoothingWindow,
	});

	try {
		const events = new EventQueue();
		const dataSource = new InMemoryDataSource({
			events,
			series: options.series,
			symbols: config.symbols,
			start: config.start,
			end: config.end,
		});
		const deps: StrategyDeps = { dataSource, events };
		const strategy = options.strategyFactory
			? options.strategyFactory(deps)
			: createStrategy(config.strategy.id, config.strategy.params, deps);
		portfolio = new Portfolio({
			dataSource,
			events,
			initialCapital: config.initialCapital,
			startTimestamp: openingTimestamp(config.start, dataSource),
			smoothingWindow: config.smoothingWindow,
		});
		const execution = new SimulatedExecutionHandler({
			dataSource,
			events,
			commission: options.commission,
			exchange: config.exchange,
		});
		backtest = new Backtest({
			events,
			dataSource,
			strategies: [strategy],
			portfolio,
			execution,
		});
		backtest.run();
	} catch (error) {
		failure = toFailure(error);
		runLogger.error("backtest_aborted", {
			error,
			ticks: backtest?.stats.ticks ?? 0,
		});
	}

	const complete = failure === undefined;
	const holdings = [...(portfolio?.getHoldingsHistory("clamped") ?? [])];
	const performance = calculatePerformance(holdings, {
		periods: config.frequency,
		complete,
	});
	const result: BacktestRunResult = {
		status: complete ? "completed" : "aborted",
		complete,
		error: failure,
		stats: backtest?.stats ?? EMPTY_STATS,
		holdings,
		rawHoldings: [...(portfolio?.getHoldingsHistory("raw") ?? [])],
		positions: [...(portfolio?.getPositionsHistory("clamped") ?? [])],
		rawPositions: [...(portfolio?.getPositionsHistory("raw") ?? [])],
		fills: [...(portfolio?.getFills() ?? [])],
		performance,
	};

	if (complete) {
		runLogger.info("backtest_completed", {
			...result.stats,
			finalEquity: performance.summary.finalEquity,
			totalReturn: performance.summary.totalReturn,
		});
	}
	return result;
};
