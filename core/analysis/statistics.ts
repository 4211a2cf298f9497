/**
 * Descriptive statistics for score distributions.
 *
 * Used for the summary row of ranking output and for checking how far
 * scores on simulated null corpora stray from 0.
 */

export interface Summary {
	count: number;
	mean: number;
	/** Sample standard deviation */
	std: number;
	min: number;
	max: number;
}

/**
 * Compute mean of an array.
 */
export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Compute sample standard deviation.
 */
export function std(values: readonly number[]): number {
	if (values.length <= 1) return 0;
	const m = mean(values);
	const variance = values.reduce((acc, v) => acc + (v - m) ** 2, 0) / (values.length - 1);
	return Math.sqrt(variance);
}

/**
 * Count, mean, standard deviation and range. All zero for an empty list.
 */
export function summarize(values: readonly number[]): Summary {
	if (values.length === 0) {
		return { count: 0, mean: 0, std: 0, min: 0, max: 0 };
	}
	return {
		count: values.length,
		mean: mean(values),
		std: std(values),
		min: values.reduce((a, b) => Math.min(a, b), Number.POSITIVE_INFINITY),
		max: values.reduce((a, b) => Math.max(a, b), Number.NEGATIVE_INFINITY),
	};
}
