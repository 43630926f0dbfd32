export type { Strategy, StrategyDeps } from "./types";
export {
	DEFAULT_MAC_PARAMS,
	MovingAverageCrossStrategy,
	validateMacParams,
	type MovingAverageCrossParams,
} from "./MovingAverageCrossStrategy";
export {
	ScriptedStrategy,
	type ScriptedSignal,
	type ScriptedStrategyParams,
} from "./ScriptedStrategy";
export {
	STRATEGY_IDS,
	createStrategy,
	getStrategyDefinition,
	isStrategyId,
	type StrategyDefinition,
	type StrategyId,
} from "./registry";
