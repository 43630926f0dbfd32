export type BacktestErrorCode =
	| "CONSTRUCTION_ERROR"
	| "UNKNOWN_INSTRUMENT"
	| "NO_BAR_DATA"
	| "CONFIG_ERROR";

export class BacktestError extends Error {
	readonly code: BacktestErrorCode;

	constructor(code: BacktestErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Raised when an event is built with values that break its invariants. */
export class ConstructionError extends BacktestError {
	constructor(message: string) {
		super("CONSTRUCTION_ERROR", message);
	}
}

export class UnknownInstrumentError extends BacktestError {
	readonly symbol: string;

	constructor(symbol: string) {
		super(
			"UNKNOWN_INSTRUMENT",
			`Symbol ${symbol} is not available in the historical data set`
		);
		this.symbol = symbol;
	}
}

export class NoBarDataError extends BacktestError {
	readonly symbol: string;

	constructor(symbol: string) {
		super("NO_BAR_DATA", `No bars have been replayed yet for ${symbol}`);
		this.symbol = symbol;
	}
}

export class ConfigError extends BacktestError {
	constructor(message: string) {
		super("CONFIG_ERROR", message);
	}
}

export const isBacktestError = (value: unknown): value is BacktestError =>
	value instanceof BacktestError;
