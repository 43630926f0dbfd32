import type { Bar, Timestamp } from "@tickloop/core";

/** A bar as it comes off a feed, before adjusted values are derived. */
export interface RawBar {
	timestamp: Timestamp;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	/** Defaults to 1 (unadjusted). */
	adjFactor?: number;
}

const PRICE_FIELDS = ["open", "high", "low", "close", "volume"] as const;

const assertFinite = (symbol: string, raw: RawBar): void => {
	if (!Number.isFinite(raw.timestamp)) {
		throw new Error(`Bar for ${symbol} has an invalid timestamp`);
	}
	for (const field of PRICE_FIELDS) {
		if (!Number.isFinite(raw[field])) {
			throw new Error(
				`Bar for ${symbol} at ${new Date(raw.timestamp).toISOString()} has a non-numeric ${field}`
			);
		}
	}
	if (raw.adjFactor !== undefined && !Number.isFinite(raw.adjFactor)) {
		throw new Error(`Bar for ${symbol} has a non-numeric adjFactor`);
	}
};

/**
 * Sorts ascending and drops duplicate timestamps (last write wins).
 */
export const normalizeRawBars = (
	symbol: string,
	bars: readonly RawBar[]
): RawBar[] => {
	bars.forEach((bar) => assertFinite(symbol, bar));
	const sorted = bars
		.map((bar, index) => ({ bar, index }))
		.sort((a, b) => a.bar.timestamp - b.bar.timestamp || a.index - b.index)
		.map(({ bar }) => bar);

	const result: RawBar[] = [];
	for (const bar of sorted) {
		const last = result[result.length - 1];
		if (last && last.timestamp === bar.timestamp) {
			result[result.length - 1] = bar;
		} else {
			result.push(bar);
		}
	}
	return result;
};

/**
 * Builds immutable bars from an ordered raw sequence, deriving the adjusted
 * close and the period return against the previous bar (0 for the first).
 */
export const deriveBars = (symbol: string, raws: readonly RawBar[]): Bar[] => {
	const bars: Bar[] = [];
	let previousAdjClose: number | null = null;
	for (const raw of raws) {
		const adjFactor = raw.adjFactor ?? 1;
		const adjClose = raw.close * adjFactor;
		const returns =
			previousAdjClose !== null && previousAdjClose !== 0
				? adjClose / previousAdjClose - 1
				: 0;
		const bar: Bar = {
			symbol,
			timestamp: raw.timestamp,
			open: raw.open,
			high: raw.high,
			low: raw.low,
			close: raw.close,
			volume: raw.volume,
			adjFactor,
			adjClose,
			returns,
		};
		bars.push(Object.freeze(bar));
		previousAdjClose = adjClose;
	}
	return bars;
};
