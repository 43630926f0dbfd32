export {
	Backtest,
	type BacktestComponents,
	type BacktestStats,
} from "./Backtest";
export {
	runBacktest,
	type BacktestFailure,
	type BacktestRunResult,
	type BacktestStatus,
	type RunBacktestOptions,
} from "./runBacktest";
