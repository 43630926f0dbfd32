import {
	ConfigError,
	isRecord,
	type SignalDirection,
} from "@tickloop/core";
import {
	MovingAverageCrossStrategy,
	type MovingAverageCrossParams,
} from "./MovingAverageCrossStrategy";
import { ScriptedStrategy, type ScriptedSignal } from "./ScriptedStrategy";
import type { Strategy, StrategyDeps } from "./types";

export const STRATEGY_IDS = ["moving_average_cross", "scripted"] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export const isStrategyId = (value: unknown): value is StrategyId =>
	STRATEGY_IDS.some((id) => id === value);

const SIGNAL_DIRECTIONS: readonly SignalDirection[] = ["LONG", "SHORT", "EXIT"];

const isSignalDirection = (value: unknown): value is SignalDirection =>
	SIGNAL_DIRECTIONS.some((direction) => direction === value);

const optionalNumber = (
	params: Record<string, unknown>,
	key: string
): number | undefined => {
	const value = params[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "number") {
		throw new ConfigError(`strategy.params.${key} must be a number`);
	}
	return value;
};

const parseMacParams = (
	params: Record<string, unknown>
): Partial<MovingAverageCrossParams> => {
	const parsed: Partial<MovingAverageCrossParams> = {};
	const shortWindow = optionalNumber(params, "shortWindow");
	const longWindow = optionalNumber(params, "longWindow");
	const quantity = optionalNumber(params, "quantity");
	if (shortWindow !== undefined) parsed.shortWindow = shortWindow;
	if (longWindow !== undefined) parsed.longWindow = longWindow;
	if (quantity !== undefined) parsed.quantity = quantity;
	return parsed;
};

const parseScript = (params: Record<string, unknown>): ScriptedSignal[] => {
	const script = params.script ?? [];
	if (!Array.isArray(script)) {
		throw new ConfigError("strategy.params.script must be an array");
	}
	return script.map((entry: unknown, index): ScriptedSignal => {
		const at = `strategy.params.script[${index}]`;
		if (!isRecord(entry)) {
			throw new ConfigError(`${at} must be an object`);
		}
		const { tick, symbol, direction } = entry;
		if (typeof tick !== "number" || !Number.isInteger(tick) || tick < 1) {
			throw new ConfigError(`${at}.tick must be a positive integer`);
		}
		if (typeof symbol !== "string" || !symbol) {
			throw new ConfigError(`${at}.symbol must be a non-empty string`);
		}
		if (!isSignalDirection(direction)) {
			throw new ConfigError(`${at}.direction must be LONG, SHORT or EXIT`);
		}
		return {
			tick,
			symbol,
			direction,
			quantity: optionalNumber(entry, "quantity"),
			strength: optionalNumber(entry, "strength"),
		};
	});
};

export interface StrategyDefinition {
	id: StrategyId;
	description: string;
	create: (params: Record<string, unknown>, deps: StrategyDeps) => Strategy;
}

const STRATEGY_DEFINITIONS: Record<StrategyId, StrategyDefinition> = {
	moving_average_cross: {
		id: "moving_average_cross",
		description: "Long on short/long SMA cross-over, exit on cross-under",
		create: (params, deps) =>
			new MovingAverageCrossStrategy(deps, parseMacParams(params)),
	},
	scripted: {
		id: "scripted",
		description: "Replays a fixed list of signals keyed by tick number",
		create: (params, deps) =>
			new ScriptedStrategy(deps, { script: parseScript(params) }),
	},
};

export const getStrategyDefinition = (id: string): StrategyDefinition => {
	if (!isStrategyId(id)) {
		throw new ConfigError(
			`Unknown strategy id "${id}". Expected one of: ${STRATEGY_IDS.join(", ")}`
		);
	}
	return STRATEGY_DEFINITIONS[id];
};

/**
 * Builds the strategy named by a backtest profile. Params arrive as parsed
 * JSON and are validated here before reaching the strategy constructor.
 */
export const createStrategy = (
	id: string,
	params: Record<string, unknown>,
	deps: StrategyDeps
): Strategy => getStrategyDefinition(id).create(params, deps);
