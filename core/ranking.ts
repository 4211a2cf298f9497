/**
 * All-pairs scoring and ranking.
 *
 * The measures themselves stay per-pair; this module is the caller that
 * walks every unordered pair once, collects scores and sorts them.
 */

import { getDefaultRegistry, type AssociationRegistry } from "./association/index.ts";
import { ItemPair } from "./association/pair.ts";
import { assertNonEmptyCorpus, cooccurrenceCount, vocabulary, type Corpus, type Item } from "./corpus.ts";
import { compareItems, enumeratePairs } from "./pairs.ts";

export type SortOrder = "asc" | "desc";

export interface ScorePairsOptions<T> {
	/** Measure names or aliases (default: every registered measure) */
	measures?: readonly string[];
	/** Items to pair up (default: the corpus vocabulary) */
	items?: readonly T[];
	compare?: (a: T, b: T) => number;
	registry?: AssociationRegistry;
	/** Skip pairs co-occurring fewer times than this */
	minCooccurrence?: number;
}

export interface PairScore<T = Item> {
	i: T;
	j: T;
	cooccurrences: number;
	/** Keyed by primary measure name */
	scores: Record<string, number>;
}

export interface RankOptions {
	order?: SortOrder;
	limit?: number;
}

/**
 * Score every unordered pair of distinct items.
 * Unknown measures fail before any pair is scored.
 *
 * @throws InvalidInputError when the corpus is empty
 * @throws RegistryNotFoundError for an unknown measure
 */
export function scorePairs<T>(corpus: Corpus<T>, options: ScorePairsOptions<T> = {}): PairScore<T>[] {
	const registry = options.registry ?? getDefaultRegistry();
	const compare = options.compare ?? compareItems;
	const measures = registry.resolveMeasures(options.measures ?? registry.listMeasureNames());
	const minCooccurrence = options.minCooccurrence ?? 0;

	assertNonEmptyCorpus(corpus);

	const items = options.items ?? vocabulary(corpus, compare);
	const results: PairScore<T>[] = [];

	for (const [i, j] of enumeratePairs(items, compare)) {
		const cooccurrences = cooccurrenceCount(i, j, corpus);
		if (cooccurrences < minCooccurrence) {
			continue;
		}

		const pair = new ItemPair(i, j, corpus);
		const scores: Record<string, number> = {};
		for (const measure of measures) {
			scores[measure.name] = measure.compute(pair).value;
		}
		results.push({ i, j, cooccurrences, scores });
	}

	return results;
}

/**
 * Sort by one measure: "desc" for the most associated pairs first,
 * "asc" for the most dissociated. Ties keep their input order.
 *
 * @throws Error if a score lacks the measure
 */
export function rankPairs<T>(
	scores: readonly PairScore<T>[],
	measure: string,
	options: RankOptions = {},
): PairScore<T>[] {
	const direction = (options.order ?? "desc") === "desc" ? -1 : 1;

	const valueOf = (entry: PairScore<T>): number => {
		const value = entry.scores[measure];
		if (value === undefined) {
			throw new Error(
				`No "${measure}" score for (${String(entry.i)}, ${String(entry.j)}). Scored: ${Object.keys(entry.scores).join(", ")}`,
			);
		}
		return value;
	};

	const ranked = scores
		.map((entry) => ({ entry, value: valueOf(entry) }))
		.sort((a, b) => direction * (a.value - b.value))
		.map(({ entry }) => entry);
	return options.limit !== undefined ? ranked.slice(0, options.limit) : ranked;
}
