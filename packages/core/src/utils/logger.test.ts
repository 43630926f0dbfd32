import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from "./logger";

const initialLevel = getLogLevel();

afterEach(() => {
	setLogLevel(initialLevel);
	vi.restoreAllMocks();
});

describe("logger levels", () => {
	it("drops entries below the level set at runtime", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
		setLogLevel("warn");
		const logger = createLogger("logger-test");

		expect(getLogLevel()).toBe("warn");
		expect(logger.isEnabled("info")).toBe(false);
		expect(logger.isEnabled("error")).toBe(true);

		logger.info("skipped");
		logger.warn("kept", { value: 1 });

		expect(spy).toHaveBeenCalledTimes(1);
		expect(JSON.parse(String(spy.mock.calls[0][0]))).toMatchObject({
			level: "warn",
			event: "kept",
			module: "logger-test",
			value: 1,
		});
	});

	it("recognizes the four level names", () => {
		expect(["debug", "info", "warn", "error"].every(isLogLevel)).toBe(true);
		expect(isLogLevel("verbose")).toBe(false);
		expect(isLogLevel("toString")).toBe(false);
	});
});
