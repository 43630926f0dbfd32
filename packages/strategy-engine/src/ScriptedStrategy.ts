import {
	createSignalEvent,
	type BacktestEvent,
	type DataSource,
	type EventSink,
	type InstrumentState,
	type SignalDirection,
} from "@tickloop/core";
import type { Strategy, StrategyDeps } from "./types";

export interface ScriptedSignal {
	/** 1-based tick number on which the signal is emitted. */
	tick: number;
	symbol: string;
	direction: SignalDirection;
	quantity?: number;
	strength?: number;
}

export interface ScriptedStrategyParams {
	id?: string;
	script: readonly ScriptedSignal[];
}

/**
 * Replays a fixed list of signals keyed by tick number. Used to drive the
 * engine through exact scenarios in tests and dry runs.
 */
export class ScriptedStrategy implements Strategy {
	readonly id: string;
	private readonly dataSource: DataSource;
	private readonly events: EventSink;
	private readonly byTick = new Map<number, ScriptedSignal[]>();
	private readonly state = new Map<string, InstrumentState>();
	private tick = 0;

	constructor(deps: StrategyDeps, params: ScriptedStrategyParams) {
		this.id = params.id ?? "scripted";
		this.dataSource = deps.dataSource;
		this.events = deps.events;
		for (const entry of params.script) {
			const bucket = this.byTick.get(entry.tick) ?? [];
			bucket.push(entry);
			this.byTick.set(entry.tick, bucket);
		}
	}

	get ticksSeen(): number {
		return this.tick;
	}

	getState(symbol: string): InstrumentState {
		return this.state.get(symbol) ?? "OUT";
	}

	onEvent(event: BacktestEvent): void {
		if (event.type !== "MARKET") {
			return;
		}
		this.tick += 1;
		for (const entry of this.byTick.get(this.tick) ?? []) {
			this.events.put(
				createSignalEvent({
					strategyId: this.id,
					symbol: entry.symbol,
					timestamp: this.dataSource.latestBarTimestamp(entry.symbol),
					direction: entry.direction,
					strength: entry.strength,
					quantity: entry.quantity,
				})
			);
			this.state.set(
				entry.symbol,
				entry.direction === "EXIT" ? "OUT" : entry.direction
			);
		}
	}
}
