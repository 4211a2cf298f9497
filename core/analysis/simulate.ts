/**
 * Sample corpora drawn under the independence null hypothesis.
 *
 * Each item lands in each basket independently with its own probability,
 * so any association a measure reports on these corpora is noise.
 */

import type { Corpus } from "../corpus.ts";

export interface SimulatedItem<T> {
	item: T;
	/** Chance of appearing in any one basket, in [0, 1] */
	probability: number;
}

export interface NullCorpusOptions<T> {
	items: readonly SimulatedItem<T>[];
	baskets: number;
	seed: number;
}

/**
 * Deterministic PRNG (mulberry32) returning floats in [0, 1).
 */
export function createRng(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

/**
 * Same seed, same corpus.
 * @throws RangeError for a probability outside [0, 1] or a negative basket count
 */
export function generateNullCorpus<T>(options: NullCorpusOptions<T>): Corpus<T> {
	if (!Number.isInteger(options.baskets) || options.baskets < 0) {
		throw new RangeError(`basket count must be a non-negative integer, got ${options.baskets}`);
	}
	for (const { item, probability } of options.items) {
		if (!(probability >= 0 && probability <= 1)) {
			throw new RangeError(`probability for "${String(item)}" must be in [0, 1], got ${probability}`);
		}
	}

	const random = createRng(options.seed);
	const corpus: Set<T>[] = [];

	for (let b = 0; b < options.baskets; b++) {
		const basket = new Set<T>();
		for (const { item, probability } of options.items) {
			if (random() < probability) {
				basket.add(item);
			}
		}
		corpus.push(basket);
	}

	return corpus;
}
