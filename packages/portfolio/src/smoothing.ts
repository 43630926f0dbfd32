import {
	ConstructionError,
	DEFAULT_SMOOTHING_WINDOW,
	createOrderEvent,
	type OrderDirection,
	type OrderEvent,
	type Timestamp,
} from "@tickloop/core";

export interface PendingOrder {
	order: OrderEvent;
	/** Ticks left before the order is released. */
	delay: number;
}

/**
 * Splits a quantity into `window` equal slices. Fractional slice sizes are
 * kept as they are.
 */
export const splitQuantity = (quantity: number, window: number): number[] => {
	if (!Number.isInteger(window) || window < 1) {
		throw new RangeError(`Smoothing window must be a positive integer, got ${window}`);
	}
	return Array.from({ length: window }, () => quantity / window);
};

export interface SliceRequest {
	symbol: string;
	timestamp: Timestamp;
	quantity: number;
	direction: OrderDirection;
}

/**
 * Per-instrument queue of delayed order slices. Orders come out in the
 * order they were scheduled.
 */
export class SmoothingQueue {
	private readonly window: number;
	private readonly pending = new Map<string, PendingOrder[]>();

	constructor(window = DEFAULT_SMOOTHING_WINDOW) {
		if (!Number.isInteger(window) || window < 1) {
			throw new RangeError(`Smoothing window must be a positive integer, got ${window}`);
		}
		this.window = window;
	}

	get smoothingWindow(): number {
		return this.window;
	}

	/**
	 * Schedules a new trade intent. Orders already waiting are pushed back
	 * one tick, the new slices are appended with delays 0..window-1, and the
	 * instrument's queue is then processed once. Returns the orders released.
	 */
	schedule(request: SliceRequest): OrderEvent[] {
		if (!Number.isFinite(request.quantity) || request.quantity <= 0) {
			throw new ConstructionError(
				`Order quantity must be a positive number, got ${request.quantity} for ${request.symbol}`
			);
		}
		const slices = splitQuantity(request.quantity, this.window);
		const queue = this.queueOf(request.symbol);
		for (const entry of queue) {
			entry.delay += 1;
		}
		slices.forEach((quantity, delay) => {
			queue.push({
				order: createOrderEvent({
					timestamp: request.timestamp,
					symbol: request.symbol,
					quantity,
					direction: request.direction,
					smoothing: delay,
				}),
				delay,
			});
		});
		return this.process(request.symbol);
	}

	/**
	 * One tick of decay for one instrument: delay 0 is released, anything
	 * else moves one tick closer.
	 */
	process(symbol: string): OrderEvent[] {
		const queue = this.pending.get(symbol);
		if (!queue?.length) {
			return [];
		}
		const released: OrderEvent[] = [];
		const kept: PendingOrder[] = [];
		for (const entry of queue) {
			if (entry.delay > 0) {
				entry.delay -= 1;
				kept.push(entry);
			} else {
				released.push(entry.order);
			}
		}
		this.pending.set(symbol, kept);
		return released;
	}

	processAll(): OrderEvent[] {
		return Array.from(this.pending.keys()).flatMap((symbol) =>
			this.process(symbol)
		);
	}

	/** Read-only copy of what is still waiting. */
	getPending(symbol?: string): PendingOrder[] {
		const queues =
			symbol === undefined
				? Array.from(this.pending.values())
				: [this.pending.get(symbol) ?? []];
		return queues.flat().map((entry) => ({ ...entry }));
	}

	pendingQuantity(symbol: string): number {
		return (this.pending.get(symbol) ?? []).reduce(
			(sum, entry) => sum + entry.order.quantity,
			0
		);
	}

	private queueOf(symbol: string): PendingOrder[] {
		let queue = this.pending.get(symbol);
		if (!queue) {
			queue = [];
			this.pending.set(symbol, queue);
		}
		return queue;
	}
}
