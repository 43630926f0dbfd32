/** Returns the commission charged for filling `quantity` units at `price`. */
export type CommissionModel = (quantity: number, price: number) => number;

export interface TieredCommissionOptions {
	minimum: number;
	/** Largest quantity still charged at `smallRate`. */
	threshold: number;
	smallRate: number;
	largeRate: number;
}

/** Per-share schedule: 1.3c up to 500 shares, 0.8c above, 1.30 minimum. */
export const DEFAULT_TIERED_COMMISSION: TieredCommissionOptions = {
	minimum: 1.3,
	threshold: 500,
	smallRate: 0.013,
	largeRate: 0.008,
};

export const createTieredCommission = (
	options: TieredCommissionOptions = DEFAULT_TIERED_COMMISSION
): CommissionModel => {
	return (quantity) => {
		const rate =
			quantity <= options.threshold ? options.smallRate : options.largeRate;
		return Math.max(options.minimum, rate * quantity);
	};
};

export const tieredCommission = createTieredCommission();

export const zeroCommission: CommissionModel = () => 0;
