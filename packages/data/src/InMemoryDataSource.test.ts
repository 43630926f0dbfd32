import { describe, expect, it } from "vitest";
import {
	EventQueue,
	NoBarDataError,
	UnknownInstrumentError,
} from "@tickloop/core";
import { InMemoryDataSource } from "./InMemoryDataSource";
import type { RawBar } from "./bars";

const baseTimestamp = Date.UTC(2024, 0, 1);
const DAY = 86_400_000;

const buildBars = (closes: number[], start = baseTimestamp): RawBar[] =>
	closes.map((close, idx) => ({
		timestamp: start + idx * DAY,
		open: close - 1,
		high: close + 1,
		low: close - 2,
		close,
		volume: 100 + idx,
	}));

const createSource = () => {
	const events = new EventQueue();
	const source = new InMemoryDataSource({
		events,
		series: {
			AAA: buildBars([10, 11, 12]),
			BBB: buildBars([20, 21, 22]),
		},
	});
	return { events, source };
};

describe("InMemoryDataSource", () => {
	it("emits one market event per successful advance", () => {
		const { events, source } = createSource();

		expect(source.advance()).toBe(true);
		expect(events.size).toBe(1);
		expect(events.take()).toEqual({ type: "MARKET", timestamp: baseTimestamp });

		expect(source.advance()).toBe(true);
		expect(events.take()).toEqual({
			type: "MARKET",
			timestamp: baseTimestamp + DAY,
		});
	});

	it("serves synchronized latest bars for every instrument", () => {
		const { source } = createSource();
		source.advance();
		source.advance();

		expect(source.latestBarTimestamp("AAA")).toBe(baseTimestamp + DAY);
		expect(source.latestBarTimestamp("BBB")).toBe(baseTimestamp + DAY);
		expect(source.latestBar("AAA").close).toBe(11);
		expect(source.latestBarField("BBB", "adjClose")).toBe(21);
	});

	it("returns fewer bars than requested when history is short", () => {
		const { source } = createSource();
		source.advance();
		source.advance();

		expect(source.latestBars("AAA", 5).map((bar) => bar.close)).toEqual([
			10, 11,
		]);
		expect(source.latestBars("AAA").map((bar) => bar.close)).toEqual([11]);
		expect(source.latestBars("AAA", 0)).toEqual([]);
		expect(source.latestBarsField("BBB", "close", 2)).toEqual([20, 21]);
	});

	it("stops on exhaustion without emitting a market event", () => {
		const { events, source } = createSource();
		while (source.advance()) {
			events.take();
		}
		expect(source.tickIndex).toBe(3);
		expect(source.continueBacktest).toBe(false);
		expect(events.isEmpty()).toBe(true);
		expect(source.advance()).toBe(false);
		expect(source.latestBar("AAA").close).toBe(12);
	});

	it("raises UnknownInstrumentError for symbols outside the feed", () => {
		const { source } = createSource();
		source.advance();
		expect(() => source.latestBar("ZZZ")).toThrowError(UnknownInstrumentError);
		expect(() => source.latestBars("ZZZ", 2)).toThrowError(
			UnknownInstrumentError
		);
	});

	it("raises NoBarDataError before the first advance", () => {
		const { source } = createSource();
		expect(() => source.latestBar("AAA")).toThrowError(NoBarDataError);
	});

	it("replays only the requested symbols in the requested order", () => {
		const events = new EventQueue();
		const source = new InMemoryDataSource({
			events,
			series: {
				AAA: buildBars([10, 11]),
				BBB: buildBars([20, 21]),
			},
			symbols: ["BBB"],
		});
		expect(source.symbols).toEqual(["BBB"]);
		source.advance();
		expect(() => source.latestBar("AAA")).toThrowError(UnknownInstrumentError);
	});

	it("rejects a requested symbol without data", () => {
		expect(
			() =>
				new InMemoryDataSource({
					events: new EventQueue(),
					series: { AAA: buildBars([10]) },
					symbols: ["AAA", "CCC"],
				})
		).toThrowError(/No bars supplied for CCC/);
	});

	it("honours the replay window", () => {
		const events = new EventQueue();
		const source = new InMemoryDataSource({
			events,
			series: { AAA: buildBars([10, 11, 12, 13]) },
			start: baseTimestamp + DAY,
			end: baseTimestamp + 2 * DAY,
		});
		expect(source.totalTicks).toBe(2);
		expect(source.calendarStart).toBe(baseTimestamp + DAY);
		expect(source.openingTimestamp).toBe(baseTimestamp);
		source.advance();
		expect(source.latestBar("AAA").close).toBe(11);
	});

	it("places the opening row one day back when only one tick exists", () => {
		const source = new InMemoryDataSource({
			events: new EventQueue(),
			series: { AAA: buildBars([10]) },
		});
		expect(source.openingTimestamp).toBe(baseTimestamp - DAY);
	});
});
