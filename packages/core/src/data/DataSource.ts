import type { Bar, BarField, Timestamp } from "../types";

/**
 * Read side of a replayed bar feed. Every query sees only bars that have
 * already been pulled in by `advance()`, so strategies and the portfolio
 * cannot look ahead.
 */
export interface DataSource {
	readonly symbols: readonly string[];
	/** False once the shared calendar is exhausted. */
	readonly continueBacktest: boolean;

	latestBar(symbol: string): Bar;
	latestBars(symbol: string, n?: number): Bar[];
	latestBarTimestamp(symbol: string): Timestamp;
	latestBarField(symbol: string, field: BarField): number;
	latestBarsField(symbol: string, field: BarField, n?: number): number[];

	/**
	 * Pulls the next synchronized bar of every instrument and emits one
	 * MARKET event. Returns false, without emitting, when no bar is left.
	 */
	advance(): boolean;
}
