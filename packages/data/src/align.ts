import type { Bar, Timestamp } from "@tickloop/core";
import { deriveBars, normalizeRawBars, type RawBar } from "./bars";

export interface AlignOptions {
	/** Inclusive window applied to the shared calendar. */
	start?: Timestamp;
	end?: Timestamp;
}

export interface AlignedSeries {
	calendar: Timestamp[];
	bars: Map<string, Bar[]>;
}

/**
 * Puts every instrument on one shared calendar.
 *
 * The calendar is the union of all timestamps, starting at the first tick
 * where every instrument has printed at least once. Missing ticks are
 * forward-filled from the instrument's previous bar, and returns are derived
 * after filling, so a filled tick carries a return of 0.
 */
export const alignSeries = (
	seriesBySymbol: ReadonlyMap<string, readonly RawBar[]>,
	options: AlignOptions = {}
): AlignedSeries => {
	const normalized = new Map<string, RawBar[]>();
	for (const [symbol, raws] of seriesBySymbol) {
		const bars = normalizeRawBars(symbol, raws);
		if (!bars.length) {
			throw new Error(`No bars supplied for ${symbol}`);
		}
		normalized.set(symbol, bars);
	}

	const commonStart = Math.max(
		...Array.from(normalized.values(), (bars) => bars[0].timestamp)
	);
	const union = new Set<Timestamp>();
	for (const bars of normalized.values()) {
		for (const bar of bars) {
			if (bar.timestamp >= commonStart) {
				union.add(bar.timestamp);
			}
		}
	}
	const fullCalendar = Array.from(union).sort((a, b) => a - b);

	const aligned = new Map<string, Bar[]>();
	for (const [symbol, raws] of normalized) {
		const filled = forwardFill(raws, fullCalendar);
		aligned.set(symbol, deriveBars(symbol, filled));
	}

	const inWindow = (ts: Timestamp): boolean =>
		(options.start === undefined || ts >= options.start) &&
		(options.end === undefined || ts <= options.end);
	const calendar = fullCalendar.filter(inWindow);
	for (const [symbol, bars] of aligned) {
		aligned.set(
			symbol,
			bars.filter((bar) => inWindow(bar.timestamp))
		);
	}

	return { calendar, bars: aligned };
};

const forwardFill = (
	raws: readonly RawBar[],
	calendar: readonly Timestamp[]
): RawBar[] => {
	const filled: RawBar[] = [];
	let cursor = 0;
	let last: RawBar | undefined;
	for (const ts of calendar) {
		while (cursor < raws.length && raws[cursor].timestamp <= ts) {
			last = raws[cursor];
			cursor += 1;
		}
		if (!last) {
			throw new Error(
				`Calendar tick ${new Date(ts).toISOString()} precedes the first bar`
			);
		}
		filled.push(last.timestamp === ts ? last : { ...last, timestamp: ts });
	}
	return filled;
};
