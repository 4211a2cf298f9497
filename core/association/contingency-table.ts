/**
 * 2×2 contingency table of joint presence/absence for two items.
 *
 *              j   |  ¬j  |
 *   ----------------------------
 *     i   |  O11  |  O12  |  R1
 *    ¬i   |  O21  |  O22  |  R2
 *         |  C1   |  C2   |  N
 *
 * Expected counts E_xy = R_x · C_y / N assume items land in baskets
 * independently of each other.
 */

import {
	assertDistinctItems,
	assertNonEmptyCorpus,
	type Corpus,
	type Item,
} from "../corpus.ts";

/**
 * Row-major 2×2 matrix: [[x11, x12], [x21, x22]].
 */
export type Matrix2x2 = readonly [readonly [number, number], readonly [number, number]];

/**
 * One term of the divergence sum. An empty cell contributes exactly 0,
 * the limit of x·log(x) as x → 0.
 */
function cellTerm(observed: number, expected: number, log: (x: number) => number): number {
	if (observed === 0) return 0;
	return observed * log(observed / expected);
}

function formatExpected(value: number): string {
	return String(Number(value.toFixed(4)));
}

/**
 * Pad every column to its widest cell and join with " | ".
 */
function renderRows(rows: string[][]): string {
	const widths: number[] = [];
	for (const row of rows) {
		row.forEach((cell, col) => {
			widths[col] = Math.max(widths[col] ?? 0, cell.length);
		});
	}
	return rows
		.map((row) =>
			row
				.map((cell, col) => cell.padEnd(widths[col] ?? 0))
				.join(" | ")
				.trimEnd(),
		)
		.join("\n");
}

export class ContingencyTable<T = Item> {
	/** Baskets with i and j */
	readonly o11: number;
	/** Baskets with i, without j */
	readonly o12: number;
	/** Baskets with j, without i */
	readonly o21: number;
	/** Baskets with neither */
	readonly o22: number;

	readonly r1: number;
	readonly r2: number;
	readonly c1: number;
	readonly c2: number;
	/** Basket count */
	readonly n: number;

	readonly e11: number;
	readonly e12: number;
	readonly e21: number;
	readonly e22: number;

	/**
	 * @throws InvalidInputError when the corpus is empty or i === j
	 */
	constructor(
		readonly i: T,
		readonly j: T,
		corpus: Corpus<T>,
	) {
		assertDistinctItems(i, j);
		assertNonEmptyCorpus(corpus);

		let o11 = 0;
		let o12 = 0;
		let o21 = 0;
		let o22 = 0;
		for (const basket of corpus) {
			const hasI = basket.has(i);
			const hasJ = basket.has(j);
			if (hasI && hasJ) o11++;
			else if (hasI) o12++;
			else if (hasJ) o21++;
			else o22++;
		}

		this.o11 = o11;
		this.o12 = o12;
		this.o21 = o21;
		this.o22 = o22;

		this.r1 = o11 + o12;
		this.r2 = o21 + o22;
		this.c1 = o11 + o21;
		this.c2 = o12 + o22;
		this.n = this.c1 + this.c2;

		this.e11 = (this.r1 * this.c1) / this.n;
		this.e12 = (this.r1 * this.c2) / this.n;
		this.e21 = (this.r2 * this.c1) / this.n;
		this.e22 = (this.r2 * this.c2) / this.n;
	}

	/**
	 * Generalized mutual information: Σ O · log2(O / E) over all four cells.
	 *
	 * A log-dampened comparison of what was observed against what random,
	 * uniform basket assembly would give. Unlike local mutual information it
	 * uses every cell, not only co-occurrence. May be negative.
	 */
	mutualInformation(): number {
		return this.sumTerms(Math.log2);
	}

	/**
	 * Log-likelihood ratio (G²): 2 · Σ O · ln(O / E).
	 *
	 * Approximates Fisher's exact test, which is exact but intractable on
	 * large corpora. Asymptotically chi-squared and so non-negative, but the
	 * value is not clamped: rounding can leave tiny negatives near 0.
	 */
	logLikelihood(): number {
		return 2 * this.sumTerms(Math.log);
	}

	observed(): Matrix2x2 {
		return [
			[this.o11, this.o12],
			[this.o21, this.o22],
		];
	}

	expected(): Matrix2x2 {
		return [
			[this.e11, this.e12],
			[this.e21, this.e22],
		];
	}

	/**
	 * Observed table with marginals, then expected table. Diagnostic only.
	 */
	toString(): string {
		const i = String(this.i);
		const j = String(this.j);

		const observed = renderRows([
			["", j, `¬${j}`, ""],
			[i, String(this.o11), String(this.o12), String(this.r1)],
			[`¬${i}`, String(this.o21), String(this.o22), String(this.r2)],
			["", String(this.c1), String(this.c2), String(this.n)],
		]);
		const expected = renderRows([
			["", j, `¬${j}`],
			[i, formatExpected(this.e11), formatExpected(this.e12)],
			[`¬${i}`, formatExpected(this.e21), formatExpected(this.e22)],
		]);

		return `Observations:\n${observed}\nExpectations:\n${expected}`;
	}

	private sumTerms(log: (x: number) => number): number {
		return (
			cellTerm(this.o11, this.e11, log) +
			cellTerm(this.o12, this.e12, log) +
			cellTerm(this.o21, this.e21, log) +
			cellTerm(this.o22, this.e22, log)
		);
	}
}

/**
 * Tabulate the pair (i, j) over the corpus.
 * @throws InvalidInputError when the corpus is empty or i === j
 */
export function computeContingencyTable<T>(
	i: T,
	j: T,
	corpus: Corpus<T>,
): ContingencyTable<T> {
	return new ContingencyTable(i, j, corpus);
}
