export function mean(values: readonly number[]): number | null {
	if (!values.length) {
		return null;
	}
	const sum = values.reduce((acc, value) => acc + value, 0);
	return sum / values.length;
}

/**
 * Simple moving average of the last `period` values, or null while fewer
 * than `period` values are available.
 */
export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}
	return mean(values.slice(values.length - period));
}
