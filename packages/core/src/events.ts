import { ConstructionError } from "./errors";
import type {
	OrderDirection,
	OrderType,
	SignalDirection,
	Timestamp,
} from "./types";

export const DEFAULT_SIGNAL_QUANTITY = 100;

export interface MarketEvent {
	readonly type: "MARKET";
	readonly timestamp: Timestamp;
}

export interface SignalEvent {
	readonly type: "SIGNAL";
	readonly strategyId: string;
	readonly symbol: string;
	readonly timestamp: Timestamp;
	readonly direction: SignalDirection;
	/** Advisory sizing hint; the portfolio does not scale by it. */
	readonly strength: number;
	readonly quantity: number;
}

export interface OrderEvent {
	readonly type: "ORDER";
	readonly timestamp: Timestamp;
	readonly symbol: string;
	readonly orderType: OrderType;
	readonly quantity: number;
	readonly direction: OrderDirection;
	/** Delay in ticks the order was scheduled with when it was smoothed. */
	readonly smoothing?: number;
}

export interface FillEvent {
	readonly type: "FILL";
	readonly timestamp: Timestamp;
	readonly symbol: string;
	readonly exchange: string;
	readonly quantity: number;
	readonly direction: OrderDirection;
	/** Price per unit the order was filled at. */
	readonly fillCost: number;
	readonly commission: number;
}

export type BacktestEvent = MarketEvent | SignalEvent | OrderEvent | FillEvent;
export type BacktestEventType = BacktestEvent["type"];

export const createMarketEvent = (timestamp: Timestamp): MarketEvent => {
	const event: MarketEvent = { type: "MARKET", timestamp };
	return Object.freeze(event);
};

export interface SignalParams {
	strategyId: string;
	symbol: string;
	timestamp: Timestamp;
	direction: SignalDirection;
	strength?: number;
	quantity?: number;
}

export const createSignalEvent = (params: SignalParams): SignalEvent => {
	const event: SignalEvent = {
		type: "SIGNAL",
		strategyId: params.strategyId,
		symbol: params.symbol,
		timestamp: params.timestamp,
		direction: params.direction,
		strength: params.strength ?? 1,
		quantity: params.quantity ?? DEFAULT_SIGNAL_QUANTITY,
	};
	return Object.freeze(event);
};

export interface OrderParams {
	timestamp: Timestamp;
	symbol: string;
	orderType?: OrderType;
	quantity: number;
	direction: OrderDirection;
	smoothing?: number;
}

export const createOrderEvent = (params: OrderParams): OrderEvent => {
	if (!Number.isFinite(params.quantity) || params.quantity <= 0) {
		throw new ConstructionError(
			`Order quantity must be a positive number, got ${params.quantity} for ${params.symbol}`
		);
	}
	if (
		params.smoothing !== undefined &&
		(!Number.isInteger(params.smoothing) || params.smoothing < 0)
	) {
		throw new ConstructionError(
			`Order smoothing delay must be a non-negative integer, got ${params.smoothing}`
		);
	}
	const event: OrderEvent = {
		type: "ORDER",
		timestamp: params.timestamp,
		symbol: params.symbol,
		orderType: params.orderType ?? "MARKET",
		quantity: params.quantity,
		direction: params.direction,
		smoothing: params.smoothing,
	};
	return Object.freeze(event);
};

export interface FillParams {
	timestamp: Timestamp;
	symbol: string;
	exchange: string;
	quantity: number;
	direction: OrderDirection;
	fillCost: number;
	commission: number;
}

export const createFillEvent = (params: FillParams): FillEvent => {
	const event: FillEvent = { type: "FILL", ...params };
	return Object.freeze(event);
};

export const describeOrder = (order: OrderEvent): string =>
	`Order: Symbol=${order.symbol}, Type=${order.orderType}, Quantity=${order.quantity}, Direction=${order.direction}`;

export const directionSign = (direction: OrderDirection): 1 | -1 =>
	direction === "BUY" ? 1 : -1;
