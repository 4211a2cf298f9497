/**
 * Log-likelihood ratio measure (G²).
 *
 * Formula:
 *   LLR = 2 · Σ O_xy · ln(O_xy / E_xy)   over the four contingency cells
 *
 * Approximates Fisher's exact test for 2×2 association; values cluster
 * near 0 for independent items.
 */

import type { AssociationMeasure, AssociationScore } from "../interface.ts";
import type { ItemPair } from "../pair.ts";

export class LogLikelihoodMeasure implements AssociationMeasure {
	readonly name = "llr";
	readonly aliases = ["log_likelihood", "log-likelihood", "g2"] as const;
	readonly description =
		"Log-likelihood ratio (G2) - approximation of Fisher's exact test";

	compute<T>(pair: ItemPair<T>): AssociationScore {
		const table = pair.table;
		return {
			name: this.name,
			value: table.logLikelihood(),
			details: { observed: table.observed(), expected: table.expected(), n: table.n },
		};
	}
}
