/**
 * Canonical enumeration of unordered item pairs.
 *
 * Every association measure here is symmetric, so each pair is
 * produced once, lower item first.
 */

/**
 * Default total order: numbers numerically (NaN last), everything else by
 * the code units of its string form.
 */
export function compareItems<T>(a: T, b: T): number {
	if (typeof a === "number" && typeof b === "number") {
		if (Number.isNaN(a) || Number.isNaN(b)) {
			return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
		}
		return a - b;
	}
	const left = String(a);
	const right = String(b);
	if (left < right) return -1;
	if (left > right) return 1;
	return 0;
}

/**
 * Every unordered pair of distinct items, as [lower, higher],
 * in lexicographic order under the comparator.
 * Repeated items in the input are ignored.
 */
export function enumeratePairs<T>(
	items: Iterable<T>,
	compare: (a: T, b: T) => number = compareItems,
): Array<[T, T]> {
	const sorted = Array.from(new Set(items)).sort(compare);
	const pairs: Array<[T, T]> = [];

	sorted.forEach((lower, index) => {
		for (const higher of sorted.slice(index + 1)) {
			pairs.push([lower, higher]);
		}
	});

	return pairs;
}
