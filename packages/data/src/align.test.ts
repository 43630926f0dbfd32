import { describe, expect, it } from "vitest";
import { alignSeries } from "./align";
import { deriveBars, normalizeRawBars, type RawBar } from "./bars";

const DAY = 86_400_000;
const day = (n: number): number => Date.UTC(2024, 0, n);

const buildBars = (points: Array<[number, number]>): RawBar[] =>
	points.map(([dayOfMonth, close]) => ({
		timestamp: day(dayOfMonth),
		open: close,
		high: close + 1,
		low: close - 1,
		close,
		volume: 1_000,
	}));

describe("deriveBars", () => {
	it("derives adjusted close and returns from the adjustment factor", () => {
		const bars = deriveBars("AAA", [
			{ ...buildBars([[1, 10]])[0], adjFactor: 2 },
			{ ...buildBars([[2, 11]])[0], adjFactor: 2 },
		]);
		expect(bars[0].adjClose).toBe(20);
		expect(bars[0].returns).toBe(0);
		expect(bars[1].adjClose).toBe(22);
		expect(bars[1].returns).toBeCloseTo(0.1, 12);
		expect(Object.isFrozen(bars[1])).toBe(true);
	});

	it("defaults the adjustment factor to 1", () => {
		const [bar] = deriveBars("AAA", buildBars([[1, 10]]));
		expect(bar.adjFactor).toBe(1);
		expect(bar.adjClose).toBe(10);
	});
});

describe("normalizeRawBars", () => {
	it("sorts and keeps the last bar for a duplicated timestamp", () => {
		const bars = normalizeRawBars("AAA", [
			...buildBars([
				[3, 13],
				[1, 11],
			]),
			...buildBars([[3, 30]]),
		]);
		expect(bars.map((bar) => bar.timestamp)).toEqual([day(1), day(3)]);
		expect(bars[1].close).toBe(30);
	});

	it("rejects non-numeric prices", () => {
		const [bar] = buildBars([[1, 10]]);
		expect(() =>
			normalizeRawBars("AAA", [{ ...bar, close: Number.NaN }])
		).toThrowError(/non-numeric close/);
	});
});

describe("alignSeries", () => {
	const series = new Map<string, RawBar[]>([
		[
			"AAA",
			buildBars([
				[1, 10],
				[2, 11],
				[3, 12],
				[4, 13],
			]),
		],
		[
			"BBB",
			buildBars([
				[2, 50],
				[4, 55],
			]),
		],
	]);

	it("starts the calendar where every instrument has a bar", () => {
		const { calendar } = alignSeries(series);
		expect(calendar).toEqual([day(2), day(3), day(4)]);
	});

	it("forward-fills missing ticks from the previous bar", () => {
		const { bars } = alignSeries(series);
		const bbb = bars.get("BBB") ?? [];
		expect(bbb.map((bar) => bar.timestamp)).toEqual([day(2), day(3), day(4)]);
		expect(bbb.map((bar) => bar.close)).toEqual([50, 50, 55]);
		expect(bbb[1].returns).toBe(0);
		expect(bbb[2].returns).toBeCloseTo(0.1, 12);
	});

	it("keeps every series the same length as the calendar", () => {
		const { calendar, bars } = alignSeries(series);
		for (const symbolBars of bars.values()) {
			expect(symbolBars).toHaveLength(calendar.length);
		}
	});

	it("restricts the calendar to the requested window", () => {
		const { calendar, bars } = alignSeries(series, {
			start: day(3),
			end: day(3) + DAY - 1,
		});
		expect(calendar).toEqual([day(3)]);
		const aaa = bars.get("AAA") ?? [];
		expect(aaa).toHaveLength(1);
		expect(aaa[0].close).toBe(12);
		expect(aaa[0].returns).toBeCloseTo(12 / 11 - 1, 12);
	});

	it("throws when an instrument has no bars", () => {
		expect(() => alignSeries(new Map([["AAA", []]]))).toThrowError(
			/No bars supplied for AAA/
		);
	});
});
