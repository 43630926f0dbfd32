import {
	ConfigError,
	createLogger,
	createSignalEvent,
	type BacktestEvent,
	type DataSource,
	type EventSink,
	type InstrumentState,
	type SignalDirection,
} from "@tickloop/core";
import { sma } from "@tickloop/indicators";
import type { Strategy, StrategyDeps } from "./types";

const strategyLogger = createLogger("strategy:mac");

export interface MovingAverageCrossParams {
	shortWindow: number;
	longWindow: number;
	/** Requested quantity of every LONG/EXIT signal. */
	quantity: number;
}

export const DEFAULT_MAC_PARAMS: MovingAverageCrossParams = {
	shortWindow: 30,
	longWindow: 120,
	quantity: 500,
};

export const validateMacParams = (
	params: MovingAverageCrossParams
): MovingAverageCrossParams => {
	const { shortWindow, longWindow, quantity } = params;
	if (!Number.isInteger(shortWindow) || shortWindow <= 0) {
		throw new ConfigError("shortWindow must be a positive integer");
	}
	if (!Number.isInteger(longWindow) || longWindow <= shortWindow) {
		throw new ConfigError("longWindow must be an integer above shortWindow");
	}
	if (!Number.isFinite(quantity) || quantity <= 0) {
		throw new ConfigError("quantity must be a positive number");
	}
	return params;
};

/**
 * Goes long when the short SMA of adjusted close rises above the long SMA
 * and exits when it falls back below. Holds no opinion until `longWindow`
 * bars have been replayed.
 */
export class MovingAverageCrossStrategy implements Strategy {
	readonly id = "moving_average_cross";
	private readonly dataSource: DataSource;
	private readonly events: EventSink;
	private readonly params: MovingAverageCrossParams;
	private readonly bought = new Map<string, InstrumentState>();

	constructor(deps: StrategyDeps, params: Partial<MovingAverageCrossParams> = {}) {
		this.dataSource = deps.dataSource;
		this.events = deps.events;
		this.params = validateMacParams({ ...DEFAULT_MAC_PARAMS, ...params });
		for (const symbol of this.dataSource.symbols) {
			this.bought.set(symbol, "OUT");
		}
	}

	getState(symbol: string): InstrumentState {
		return this.bought.get(symbol) ?? "OUT";
	}

	onEvent(event: BacktestEvent): void {
		if (event.type !== "MARKET") {
			return;
		}
		const { shortWindow, longWindow } = this.params;

		for (const symbol of this.dataSource.symbols) {
			const closes = this.dataSource.latestBarsField(
				symbol,
				"adjClose",
				longWindow
			);
			const shortSma = sma(closes, shortWindow);
			const longSma = sma(closes, longWindow);
			if (shortSma === null || longSma === null) {
				continue;
			}

			const state = this.getState(symbol);
			if (shortSma > longSma && state === "OUT") {
				this.emit(symbol, "LONG", shortSma, longSma);
				this.bought.set(symbol, "LONG");
			} else if (shortSma < longSma && state === "LONG") {
				this.emit(symbol, "EXIT", shortSma, longSma);
				this.bought.set(symbol, "OUT");
			}
		}
	}

	private emit(
		symbol: string,
		direction: SignalDirection,
		shortSma: number,
		longSma: number
	): void {
		const timestamp = this.dataSource.latestBarTimestamp(symbol);
		strategyLogger.debug("signal_emitted", {
			symbol,
			direction,
			timestamp: new Date(timestamp).toISOString(),
			shortSma,
			longSma,
		});
		this.events.put(
			createSignalEvent({
				strategyId: this.id,
				symbol,
				timestamp,
				direction,
				strength: 1,
				quantity: this.params.quantity,
			})
		);
	}
}
