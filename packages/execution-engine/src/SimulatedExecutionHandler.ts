import {
	DEFAULT_EXCHANGE,
	createFillEvent,
	createLogger,
	type DataSource,
	type EventSink,
	type FillEvent,
	type OrderEvent,
} from "@tickloop/core";
import { tieredCommission, type CommissionModel } from "./commission";

const executionLogger = createLogger("execution");

export interface ExecutionHandler {
	executeOrder(order: OrderEvent): FillEvent;
}

export interface SimulatedExecutionOptions {
	dataSource: DataSource;
	events: EventSink;
	commission?: CommissionModel;
	exchange?: string;
}

/**
 * Fills every order in full at the latest close of its instrument, with
 * no latency and no slippage.
 */
export class SimulatedExecutionHandler implements ExecutionHandler {
	private readonly dataSource: DataSource;
	private readonly events: EventSink;
	private readonly commission: CommissionModel;
	private readonly exchange: string;

	constructor(options: SimulatedExecutionOptions) {
		this.dataSource = options.dataSource;
		this.events = options.events;
		this.commission = options.commission ?? tieredCommission;
		this.exchange = options.exchange ?? DEFAULT_EXCHANGE;
	}

	executeOrder(order: OrderEvent): FillEvent {
		const bar = this.dataSource.latestBar(order.symbol);
		const fill = createFillEvent({
			timestamp: bar.timestamp,
			symbol: order.symbol,
			exchange: this.exchange,
			quantity: order.quantity,
			direction: order.direction,
			fillCost: bar.close,
			commission: this.commission(order.quantity, bar.close),
		});
		executionLogger.debug("order_filled", {
			symbol: fill.symbol,
			direction: fill.direction,
			quantity: fill.quantity,
			fillCost: fill.fillCost,
			commission: fill.commission,
		});
		this.events.put(fill);
		return fill;
	}
}
