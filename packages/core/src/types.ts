/** UTC epoch milliseconds. */
export type Timestamp = number;

/**
 * One OHLCV record for one instrument at one tick. `adjClose` and `returns`
 * are derived when the bar is built and never change afterwards.
 */
export interface Bar {
	symbol: string;
	timestamp: Timestamp;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	adjFactor: number;
	adjClose: number;
	returns: number;
}

export type BarField =
	| "open"
	| "high"
	| "low"
	| "close"
	| "volume"
	| "adjFactor"
	| "adjClose"
	| "returns";

export type SignalDirection = "LONG" | "SHORT" | "EXIT";
export type OrderType = "MARKET" | "LIMIT";
export type OrderDirection = "BUY" | "SELL";

export type InstrumentState = "OUT" | "LONG" | "SHORT";

export interface PositionsSnapshot {
	timestamp: Timestamp;
	positions: Record<string, number>;
}

export interface HoldingsSnapshot {
	timestamp: Timestamp;
	/** Market value per instrument. */
	values: Record<string, number>;
	cash: number;
	commission: number;
	total: number;
}

/** Which of the two recorded histories to read. */
export type SnapshotView = "clamped" | "raw";
