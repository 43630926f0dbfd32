import type { BacktestEvent, DataSource, EventSink } from "@tickloop/core";

/**
 * Consumes the event stream and pushes SIGNAL events for the instruments it
 * has an opinion on. Implementations react to MARKET events only and must be
 * deterministic given the events and the bar history they query.
 */
export interface Strategy {
	readonly id: string;
	onEvent(event: BacktestEvent): void;
}

export interface StrategyDeps {
	dataSource: DataSource;
	events: EventSink;
}
