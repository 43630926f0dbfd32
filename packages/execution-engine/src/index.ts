export {
	SimulatedExecutionHandler,
	type ExecutionHandler,
	type SimulatedExecutionOptions,
} from "./SimulatedExecutionHandler";
export {
	DEFAULT_TIERED_COMMISSION,
	createTieredCommission,
	tieredCommission,
	zeroCommission,
	type CommissionModel,
	type TieredCommissionOptions,
} from "./commission";
