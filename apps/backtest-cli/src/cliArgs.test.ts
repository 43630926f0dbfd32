import { describe, it, expect } from "vitest";
import { ConfigError } from "@tickloop/core";
import {
	buildConfigOverrides,
	isFlagSet,
	parseCliArgs,
	readLogLevelArg,
	readStringArg,
} from "./cliArgs";

describe("backtest CLI arg parsing", () => {
	it("captures --strategy flag with space", () => {
		const args = parseCliArgs(["--strategy", "scripted", "--json"]);
		expect(args.strategy).toBe("scripted");
		expect(isFlagSet(args, "json")).toBe(true);
	});

	it("captures --strategy flag with equals syntax", () => {
		const args = parseCliArgs(["--strategy=moving_average_cross"]);
		expect(args.strategy).toBe("moving_average_cross");
	});

	it("treats the first two positionals as start and end", () => {
		const args = parseCliArgs(["2020-01-01", "2020-06-30"]);
		expect(args).toEqual({ start: "2020-01-01", end: "2020-06-30" });
	});

	it("rejects a valued flag given without a value", () => {
		const args = parseCliArgs(["--profile"]);
		expect(() => readStringArg(args, "profile")).toThrowError(
			"--profile requires a value"
		);
	});
});

describe("buildConfigOverrides", () => {
	it("maps flags onto profile keys", () => {
		const overrides = buildConfigOverrides(
			parseCliArgs([
				"--symbols",
				"AAA, BBB",
				"--start=2020-01-01",
				"--initialCapital",
				"250000",
				"--smoothingWindow",
				"3",
				"--strategy",
				"moving_average_cross",
				"--params",
				'{"shortWindow":10,"longWindow":40}',
			])
		);
		expect(overrides).toEqual({
			symbols: ["AAA", "BBB"],
			start: "2020-01-01",
			initialCapital: 250_000,
			smoothingWindow: 3,
			strategy: {
				id: "moving_average_cross",
				params: { shortWindow: 10, longWindow: 40 },
			},
		});
	});

	it("returns nothing when no flag is given", () => {
		expect(buildConfigOverrides(parseCliArgs(["--json"]))).toEqual({});
	});

	it("rejects malformed numbers and params", () => {
		expect(() =>
			buildConfigOverrides(parseCliArgs(["--frequency", "daily"]))
		).toThrowError("Invalid numeric value for --frequency: daily");
		expect(() =>
			buildConfigOverrides(parseCliArgs(["--params", "[1,2]"]))
		).toThrowError(ConfigError);
	});

	it("reads --logLevel case-insensitively", () => {
		expect(readLogLevelArg(parseCliArgs(["--logLevel", "DEBUG"]))).toBe("debug");
		expect(readLogLevelArg(parseCliArgs(["--json"]))).toBeUndefined();
	});

	it("rejects an unknown --logLevel", () => {
		expect(() => readLogLevelArg(parseCliArgs(["--logLevel=verbose"]))).toThrow(
			"--logLevel must be one of debug, info, warn, error, got verbose"
		);
	});
});
