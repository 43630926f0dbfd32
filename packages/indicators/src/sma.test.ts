import { describe, expect, it } from "vitest";
import { mean, sma } from "./sma";

describe("sma", () => {
	it("averages the most recent window", () => {
		expect(sma([1, 2, 3, 4, 5], 3)).toBe(4);
		expect(sma([2, 4], 2)).toBe(3);
	});

	it("returns null until a full window is available", () => {
		expect(sma([1, 2], 3)).toBeNull();
		expect(sma([1, 2], 0)).toBeNull();
	});

	it("returns null for the mean of nothing", () => {
		expect(mean([])).toBeNull();
		expect(mean([3])).toBe(3);
	});
});
