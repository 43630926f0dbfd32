import {
	DEFAULT_SMOOTHING_WINDOW,
	UnknownInstrumentError,
	createLogger,
	describeOrder,
	directionSign,
	type DataSource,
	type EventSink,
	type FillEvent,
	type HoldingsSnapshot,
	type InstrumentState,
	type OrderDirection,
	type OrderEvent,
	type PositionsSnapshot,
	type SignalEvent,
	type SnapshotView,
	type Timestamp,
} from "@tickloop/core";
import { SmoothingQueue, type PendingOrder } from "./smoothing";

const portfolioLogger = createLogger("portfolio");

export interface PortfolioOptions {
	dataSource: DataSource;
	events: EventSink;
	initialCapital: number;
	/** Timestamp of the capital-only row that opens both histories. */
	startTimestamp: Timestamp;
	smoothingWindow?: number;
}

export interface CurrentHoldings {
	cash: number;
	commission: number;
	/** Cost basis per instrument, moved by every fill. */
	values: Record<string, number>;
	total: number;
}

const stateOf = (position: number): InstrumentState =>
	position > 0 ? "LONG" : position < 0 ? "SHORT" : "OUT";

const sumValues = (values: Record<string, number>): number =>
	Object.values(values).reduce((acc, value) => acc + value, 0);

/**
 * Turns signals into smoothed orders, books fills, and records one
 * positions row and one holdings row per tick.
 */
export class Portfolio {
	readonly initialCapital: number;
	private readonly dataSource: DataSource;
	private readonly events: EventSink;
	private readonly symbols: readonly string[];
	private readonly smoothing: SmoothingQueue;
	private readonly positions = new Map<string, number>();
	private readonly costBasis = new Map<string, number>();
	private readonly fills: FillEvent[] = [];
	private cash: number;
	private commission = 0;

	private readonly positionsHistory: Record<SnapshotView, PositionsSnapshot[]> =
		{ clamped: [], raw: [] };
	private readonly holdingsHistory: Record<SnapshotView, HoldingsSnapshot[]> = {
		clamped: [],
		raw: [],
	};

	constructor(options: PortfolioOptions) {
		if (!Number.isFinite(options.initialCapital) || options.initialCapital <= 0) {
			throw new RangeError(
				`Initial capital must be a positive number, got ${options.initialCapital}`
			);
		}
		this.initialCapital = options.initialCapital;
		this.dataSource = options.dataSource;
		this.events = options.events;
		this.symbols = options.dataSource.symbols;
		this.smoothing = new SmoothingQueue(
			options.smoothingWindow ?? DEFAULT_SMOOTHING_WINDOW
		);
		this.cash = options.initialCapital;
		for (const symbol of this.symbols) {
			this.positions.set(symbol, 0);
			this.costBasis.set(symbol, 0);
		}

		const zeros = this.perSymbol(() => 0);
		for (const view of ["clamped", "raw"] as const) {
			this.positionsHistory[view].push({
				timestamp: options.startTimestamp,
				positions: { ...zeros },
			});
			this.holdingsHistory[view].push({
				timestamp: options.startTimestamp,
				values: { ...zeros },
				cash: this.cash,
				commission: 0,
				total: this.cash,
			});
		}
	}

	get smoothingWindow(): number {
		return this.smoothing.smoothingWindow;
	}

	getPosition(symbol: string): number {
		const position = this.positions.get(symbol);
		if (position === undefined) {
			throw new UnknownInstrumentError(symbol);
		}
		return position;
	}

	getInstrumentState(symbol: string): InstrumentState {
		return stateOf(this.getPosition(symbol));
	}

	getPendingOrders(symbol?: string): PendingOrder[] {
		return this.smoothing.getPending(symbol);
	}

	getFills(): readonly FillEvent[] {
		return this.fills;
	}

	getCurrentHoldings(): CurrentHoldings {
		const values = this.perSymbol((symbol) => this.costBasis.get(symbol) ?? 0);
		return {
			cash: this.cash,
			commission: this.commission,
			values,
			total: this.cash + sumValues(values),
		};
	}

	getPositionsHistory(view: SnapshotView = "clamped"): readonly PositionsSnapshot[] {
		return this.positionsHistory[view];
	}

	getHoldingsHistory(view: SnapshotView = "clamped"): readonly HoldingsSnapshot[] {
		return this.holdingsHistory[view];
	}

	/**
	 * Releases whatever the smoothing queue has due this tick. Called once
	 * per MARKET event, after the strategies have seen it.
	 */
	onMarket(): OrderEvent[] {
		const released = this.smoothing.processAll();
		this.release(released);
		return released;
	}

	onSignal(signal: SignalEvent): OrderEvent[] {
		const position = this.getPosition(signal.symbol);
		const intent = this.resolveIntent(signal, position);
		if (!intent) {
			return [];
		}
		const released = this.smoothing.schedule({
			symbol: signal.symbol,
			timestamp: signal.timestamp,
			quantity: intent.quantity,
			direction: intent.direction,
		});
		this.release(released);
		return released;
	}

	onFill(fill: FillEvent): void {
		const position = this.getPosition(fill.symbol);
		const sign = directionSign(fill.direction);
		const cost = sign * fill.fillCost * fill.quantity;

		this.positions.set(fill.symbol, position + sign * fill.quantity);
		this.costBasis.set(
			fill.symbol,
			(this.costBasis.get(fill.symbol) ?? 0) + cost
		);
		this.cash -= cost + fill.commission;
		this.commission += fill.commission;
		this.fills.push(fill);

		portfolioLogger.debug("fill_applied", {
			symbol: fill.symbol,
			direction: fill.direction,
			quantity: fill.quantity,
			fillCost: fill.fillCost,
			commission: fill.commission,
			position: this.positions.get(fill.symbol),
			cash: this.cash,
		});
	}

	/**
	 * Appends one positions row and one holdings row, valued at the latest
	 * adjusted close. The clamped view floors positions and market values at
	 * zero; the raw view keeps short exposure.
	 */
	updateTimeIndex(): void {
		const timestamp = this.dataSource.latestBarTimestamp(this.symbols[0]);
		const rawPositions = this.perSymbol((symbol) => this.getPosition(symbol));
		const rawValues = this.perSymbol(
			(symbol) =>
				this.getPosition(symbol) *
				this.dataSource.latestBarField(symbol, "adjClose")
		);
		const clampedPositions = this.perSymbol((symbol) =>
			Math.max(0, rawPositions[symbol])
		);
		const clampedValues = this.perSymbol((symbol) =>
			Math.max(0, rawValues[symbol])
		);

		this.positionsHistory.raw.push({ timestamp, positions: rawPositions });
		this.positionsHistory.clamped.push({ timestamp, positions: clampedPositions });
		this.holdingsHistory.raw.push(this.holdingsRow(timestamp, rawValues));
		this.holdingsHistory.clamped.push(this.holdingsRow(timestamp, clampedValues));
	}

	private resolveIntent(
		signal: SignalEvent,
		position: number
	): { quantity: number; direction: OrderDirection } | null {
		switch (signal.direction) {
			case "LONG":
				return { quantity: signal.quantity, direction: "BUY" };
			case "EXIT":
				if (position === 0) {
					return null;
				}
				return {
					quantity: Math.abs(position),
					direction: position > 0 ? "SELL" : "BUY",
				};
			case "SHORT":
				if (position !== 0) {
					portfolioLogger.info("short_ignored", {
						symbol: signal.symbol,
						position,
						reason: "SHORT is only taken from a flat position",
					});
					return null;
				}
				return { quantity: signal.quantity, direction: "SELL" };
		}
	}

	private release(orders: readonly OrderEvent[]): void {
		const verbose = portfolioLogger.isEnabled("debug");
		for (const order of orders) {
			if (verbose) {
				portfolioLogger.debug("order_released", {
					order: describeOrder(order),
					smoothing: order.smoothing,
				});
			}
			this.events.put(order);
		}
	}

	private holdingsRow(
		timestamp: Timestamp,
		values: Record<string, number>
	): HoldingsSnapshot {
		return {
			timestamp,
			values,
			cash: this.cash,
			commission: this.commission,
			total: this.cash + sumValues(values),
		};
	}

	private perSymbol(fn: (symbol: string) => number): Record<string, number> {
		const row: Record<string, number> = {};
		for (const symbol of this.symbols) {
			row[symbol] = fn(symbol);
		}
		return row;
	}
}
