import {
	createLogger,
	createMarketEvent,
	NoBarDataError,
	UnknownInstrumentError,
	type Bar,
	type BarField,
	type DataSource,
	type EventSink,
	type Timestamp,
} from "@tickloop/core";
import { alignSeries } from "./align";
import type { RawBar } from "./bars";

const DAY_MS = 86_400_000;

const dataLogger = createLogger("data:in-memory");

export type RawSeriesInput =
	| ReadonlyMap<string, readonly RawBar[]>
	| Readonly<Record<string, readonly RawBar[]>>;

export interface InMemoryDataSourceOptions {
	events: EventSink;
	series: RawSeriesInput;
	/** Replay order of instruments; defaults to the order of `series`. */
	symbols?: readonly string[];
	start?: Timestamp;
	end?: Timestamp;
}

const isSeriesMap = (
	input: RawSeriesInput
): input is ReadonlyMap<string, readonly RawBar[]> => input instanceof Map;

const toMap = (input: RawSeriesInput): ReadonlyMap<string, readonly RawBar[]> =>
	isSeriesMap(input) ? input : new Map(Object.entries(input));

/**
 * Replays fully materialized bar series. All series are aligned onto one
 * calendar at construction, so each `advance()` yields one bar per
 * instrument with the same timestamp.
 */
export class InMemoryDataSource implements DataSource {
	readonly symbols: readonly string[];
	private readonly events: EventSink;
	private readonly calendar: Timestamp[];
	private readonly aligned: Map<string, Bar[]>;
	private readonly history = new Map<string, Bar[]>();
	private cursor = 0;
	private active = true;

	constructor(options: InMemoryDataSourceOptions) {
		const source = toMap(options.series);
		const symbols = options.symbols ?? Array.from(source.keys());
		const selected = new Map<string, readonly RawBar[]>();
		for (const symbol of symbols) {
			const raws = source.get(symbol);
			if (!raws) {
				throw new Error(`No bars supplied for ${symbol}`);
			}
			selected.set(symbol, raws);
			this.history.set(symbol, []);
		}

		const { calendar, bars } = alignSeries(selected, {
			start: options.start,
			end: options.end,
		});
		this.symbols = Object.freeze([...symbols]);
		this.events = options.events;
		this.calendar = calendar;
		this.aligned = bars;

		dataLogger.debug("series_aligned", {
			symbols: this.symbols,
			ticks: calendar.length,
			first: calendar.length ? new Date(calendar[0]).toISOString() : null,
			last: calendar.length
				? new Date(calendar[calendar.length - 1]).toISOString()
				: null,
		});
	}

	get continueBacktest(): boolean {
		return this.active;
	}

	/** Number of ticks already replayed. */
	get tickIndex(): number {
		return this.cursor;
	}

	get totalTicks(): number {
		return this.calendar.length;
	}

	/** Timestamp of the first tick that will be replayed. */
	get calendarStart(): Timestamp | undefined {
		return this.calendar[0];
	}

	/**
	 * Timestamp for the capital-only row recorded before replay starts: one
	 * calendar step ahead of the first tick, or one day with a single tick.
	 */
	get openingTimestamp(): Timestamp | undefined {
		const [first, second] = this.calendar;
		if (first === undefined) {
			return undefined;
		}
		return first - (second === undefined ? DAY_MS : second - first);
	}

	advance(): boolean {
		if (!this.active) {
			return false;
		}
		if (this.cursor >= this.calendar.length) {
			this.active = false;
			dataLogger.debug("series_exhausted", { ticks: this.cursor });
			return false;
		}

		for (const symbol of this.symbols) {
			const bar = this.alignedBars(symbol)[this.cursor];
			this.historyOf(symbol).push(bar);
		}
		const timestamp = this.calendar[this.cursor];
		this.cursor += 1;
		this.events.put(createMarketEvent(timestamp));
		return true;
	}

	latestBar(symbol: string): Bar {
		const bars = this.historyOf(symbol);
		const bar = bars[bars.length - 1];
		if (!bar) {
			throw new NoBarDataError(symbol);
		}
		return bar;
	}

	latestBars(symbol: string, n = 1): Bar[] {
		const bars = this.historyOf(symbol);
		if (n <= 0) {
			return [];
		}
		return bars.slice(-n);
	}

	latestBarTimestamp(symbol: string): Timestamp {
		return this.latestBar(symbol).timestamp;
	}

	latestBarField(symbol: string, field: BarField): number {
		return this.latestBar(symbol)[field];
	}

	latestBarsField(symbol: string, field: BarField, n = 1): number[] {
		return this.latestBars(symbol, n).map((bar) => bar[field]);
	}

	private historyOf(symbol: string): Bar[] {
		const bars = this.history.get(symbol);
		if (!bars) {
			throw new UnknownInstrumentError(symbol);
		}
		return bars;
	}

	private alignedBars(symbol: string): Bar[] {
		const bars = this.aligned.get(symbol);
		if (!bars) {
			throw new UnknownInstrumentError(symbol);
		}
		return bars;
	}
}
