import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadBarsFromCsv, loadCsvDirectory, parseBarsCsv } from "./csv";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");

describe("CSV bar loading", () => {
	it("reads the daily price export layout", () => {
		const bars = loadBarsFromCsv(path.join(FIXTURE_DIR, "AAA.csv"));
		expect(bars).toHaveLength(3);
		expect(bars[0]).toEqual({
			timestamp: Date.UTC(2024, 0, 3),
			open: 10.2,
			high: 10.8,
			low: 10.1,
			close: 10.5,
			volume: 1200,
			adjFactor: 1,
		});
		expect(bars[2].adjFactor).toBe(1.5);
	});

	it("accepts plain OHLCV headers with epoch timestamps", () => {
		const bars = loadBarsFromCsv(path.join(FIXTURE_DIR, "BBB.csv"));
		expect(bars).toEqual([
			{
				timestamp: 1704153600000,
				open: 20,
				high: 21,
				low: 19,
				close: 20.5,
				volume: 300,
				adjFactor: undefined,
			},
		]);
	});

	it("loads one file per symbol", () => {
		const series = loadCsvDirectory(FIXTURE_DIR, ["AAA", "BBB"]);
		expect(Array.from(series.keys())).toEqual(["AAA", "BBB"]);
		expect(series.get("AAA")).toHaveLength(3);
	});

	it("fails on a missing symbol file", () => {
		expect(() => loadCsvDirectory(FIXTURE_DIR, ["ZZZ"])).toThrowError(
			/No CSV file for ZZZ/
		);
	});

	it("reports the row of a malformed value", () => {
		const content = [
			"timestamp,open,high,low,close,volume",
			"2024-01-02,1,2,0.5,abc,10",
		].join("\n");
		expect(() => parseBarsCsv(content, "inline.csv")).toThrowError(
			'Invalid close "abc" at inline.csv:2'
		);
	});
});
