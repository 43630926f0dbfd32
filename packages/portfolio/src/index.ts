export {
	Portfolio,
	type CurrentHoldings,
	type PortfolioOptions,
} from "./Portfolio";
export {
	SmoothingQueue,
	splitQuantity,
	type PendingOrder,
	type SliceRequest,
} from "./smoothing";
