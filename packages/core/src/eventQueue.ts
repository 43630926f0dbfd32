import type { BacktestEvent } from "./events";

/**
 * Unbounded FIFO channel shared by every component of one run.
 * Producers only `put`; the scheduler is the only consumer.
 */
export interface EventSink {
	put(event: BacktestEvent): void;
}

export class EventQueue implements EventSink {
	private items: BacktestEvent[] = [];
	private head = 0;

	put(event: BacktestEvent): void {
		this.items.push(event);
	}

	/** Removes and returns the oldest event, or undefined when empty. */
	take(): BacktestEvent | undefined {
		if (this.head >= this.items.length) {
			return undefined;
		}
		const event = this.items[this.head];
		this.head += 1;
		if (this.head > 1024 && this.head * 2 > this.items.length) {
			this.items = this.items.slice(this.head);
			this.head = 0;
		}
		return event;
	}

	get size(): number {
		return this.items.length - this.head;
	}

	isEmpty(): boolean {
		return this.size === 0;
	}

	clear(): void {
		this.items = [];
		this.head = 0;
	}
}
