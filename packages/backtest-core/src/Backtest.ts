import {
	createLogger,
	type BacktestEvent,
	type DataSource,
	type EventQueue,
} from "@tickloop/core";
import type { ExecutionHandler } from "@tickloop/execution-engine";
import type { Portfolio } from "@tickloop/portfolio";
import type { Strategy } from "@tickloop/strategy-engine";

const schedulerLogger = createLogger("backtest:scheduler");

export interface BacktestComponents {
	events: EventQueue;
	dataSource: DataSource;
	strategies: readonly Strategy[];
	portfolio: Portfolio;
	execution: ExecutionHandler;
}

export type BacktestStats = {
	ticks: number;
	signals: number;
	orders: number;
	fills: number;
};

/**
 * Drives one replay: each tick pulls a bar per instrument, drains the event
 * queue in FIFO order and then snapshots the portfolio. Errors propagate to
 * the caller, leaving the current tick without a snapshot.
 */
export class Backtest {
	private readonly components: BacktestComponents;
	private readonly counters: BacktestStats = {
		ticks: 0,
		signals: 0,
		orders: 0,
		fills: 0,
	};

	constructor(components: BacktestComponents) {
		this.components = components;
	}

	get stats(): BacktestStats {
		return { ...this.counters };
	}

	run(): BacktestStats {
		const { dataSource, events, portfolio } = this.components;
		while (dataSource.advance()) {
			this.counters.ticks += 1;
			for (let event = events.take(); event; event = events.take()) {
				this.dispatch(event);
			}
			portfolio.updateTimeIndex();
		}
		schedulerLogger.debug("replay_finished", this.stats);
		return this.stats;
	}

	private dispatch(event: BacktestEvent): void {
		const { strategies, portfolio, execution } = this.components;
		switch (event.type) {
			case "MARKET":
				for (const strategy of strategies) {
					strategy.onEvent(event);
				}
				portfolio.onMarket();
				return;
			case "SIGNAL":
				this.counters.signals += 1;
				portfolio.onSignal(event);
				return;
			case "ORDER":
				this.counters.orders += 1;
				execution.executeOrder(event);
				return;
			case "FILL":
				this.counters.fills += 1;
				portfolio.onFill(event);
				return;
		}
	}
}
