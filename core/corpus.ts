/**
 * Corpus model: items, baskets and the counting helpers shared by
 * every association measure.
 */

import { InvalidInputError } from "./errors.ts";
import { compareItems } from "./pairs.ts";

/**
 * Default item label. Every core API is generic over the item type.
 */
export type Item = string;

/**
 * One transaction: which items are present. No quantities.
 */
export type Basket<T = Item> = ReadonlySet<T>;

/**
 * Ordered sequence of baskets.
 */
export type Corpus<T = Item> = readonly Basket<T>[];

/**
 * Build a corpus from any iterable of iterables.
 * Duplicates inside a basket collapse; the input is not mutated.
 */
export function createCorpus<T>(baskets: Iterable<Iterable<T>>): Corpus<T> {
	const corpus: Basket<T>[] = [];
	for (const basket of baskets) {
		corpus.push(new Set(basket));
	}
	return corpus;
}

/**
 * All distinct items in the corpus, sorted.
 */
export function vocabulary<T>(
	corpus: Corpus<T>,
	compare: (a: T, b: T) => number = compareItems,
): T[] {
	const seen = new Set<T>();
	for (const basket of corpus) {
		for (const item of basket) {
			seen.add(item);
		}
	}
	return Array.from(seen).sort(compare);
}

/**
 * Number of baskets containing the item.
 */
export function itemFrequency<T>(item: T, corpus: Corpus<T>): number {
	let count = 0;
	for (const basket of corpus) {
		if (basket.has(item)) count++;
	}
	return count;
}

/**
 * Number of baskets containing both items.
 */
export function cooccurrenceCount<T>(i: T, j: T, corpus: Corpus<T>): number {
	let count = 0;
	for (const basket of corpus) {
		if (basket.has(i) && basket.has(j)) count++;
	}
	return count;
}

/**
 * Sum of basket sizes. This is the item-occurrence count,
 * not the basket count.
 */
export function totalOccurrences<T>(corpus: Corpus<T>): number {
	let total = 0;
	for (const basket of corpus) {
		total += basket.size;
	}
	return total;
}

/**
 * @throws InvalidInputError (empty_corpus) when the corpus has no baskets
 */
export function assertNonEmptyCorpus<T>(corpus: Corpus<T>): void {
	if (corpus.length === 0) {
		throw new InvalidInputError("empty_corpus", "corpus must be non-empty");
	}
}

/**
 * @throws InvalidInputError (identical_items) when both items are the same
 */
export function assertDistinctItems<T>(i: T, j: T): void {
	if (i === j) {
		throw new InvalidInputError(
			"identical_items",
			`cannot associate an item with itself: "${String(i)}"`,
		);
	}
}
