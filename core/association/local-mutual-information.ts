/**
 * Local mutual information: the single-cell association score.
 *
 * Compares observed co-occurrence of i and j against what random, uniform
 * assembly of baskets would produce:
 *
 *   LMI(i, j) = log2(O / E),   E = freq(i) · freq(j) / N'
 *
 * where N' is the total number of item occurrences across all baskets
 * (the sum of basket sizes), not the basket count.
 *
 * - LMI = 0: no association (buying one says nothing about the other)
 * - LMI > 0: positive association
 * - LMI < 0: negative association
 *
 * The score ignores sample size: (O = 2, E = 1) and (O = 2·10^25, E = 10^25)
 * both give 1. It is unreliable for rarely purchased items; the
 * contingency-table measures use the rest of the table for that reason.
 */

import {
	assertDistinctItems,
	assertNonEmptyCorpus,
	cooccurrenceCount,
	itemFrequency,
	totalOccurrences,
	type Corpus,
} from "../corpus.ts";

export interface LocalMutualInformationDetails {
	value: number;
	cooccurrences: number;
	frequencyI: number;
	frequencyJ: number;
	totalOccurrences: number;
	/** Absent when the items never co-occur */
	expected?: number;
}

/**
 * LMI together with the counts it was computed from.
 * @throws InvalidInputError when the corpus is empty or i === j
 */
export function localMutualInformationDetails<T>(
	i: T,
	j: T,
	corpus: Corpus<T>,
): LocalMutualInformationDetails {
	assertDistinctItems(i, j);
	assertNonEmptyCorpus(corpus);

	const cooccurrences = cooccurrenceCount(i, j, corpus);
	const frequencyI = itemFrequency(i, corpus);
	const frequencyJ = itemFrequency(j, corpus);
	const occurrences = totalOccurrences(corpus);

	// Items that never co-occur carry zero information, not -Infinity.
	if (cooccurrences === 0) {
		return {
			value: 0,
			cooccurrences,
			frequencyI,
			frequencyJ,
			totalOccurrences: occurrences,
		};
	}

	const expected = (frequencyI * frequencyJ) / occurrences;

	return {
		value: Math.log2(cooccurrences / expected),
		cooccurrences,
		frequencyI,
		frequencyJ,
		totalOccurrences: occurrences,
		expected,
	};
}

/**
 * log2(O / E) for the pair, or exactly 0 when the items never co-occur.
 * @throws InvalidInputError when the corpus is empty or i === j
 */
export function localMutualInformation<T>(i: T, j: T, corpus: Corpus<T>): number {
	assertDistinctItems(i, j);
	assertNonEmptyCorpus(corpus);

	const cooccurrences = cooccurrenceCount(i, j, corpus);
	if (cooccurrences === 0) {
		return 0;
	}

	const expected =
		(itemFrequency(i, corpus) * itemFrequency(j, corpus)) / totalOccurrences(corpus);
	return Math.log2(cooccurrences / expected);
}
