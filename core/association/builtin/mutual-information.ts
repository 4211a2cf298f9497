/**
 * Generalized mutual information measure.
 *
 * Formula:
 *   MI = Σ O_xy · log2(O_xy / E_xy)   over the four contingency cells
 *
 * Empty cells contribute 0.
 */

import type { AssociationMeasure, AssociationScore } from "../interface.ts";
import type { ItemPair } from "../pair.ts";

export class MutualInformationMeasure implements AssociationMeasure {
	readonly name = "mi";
	readonly aliases = ["mutual_information", "gmi", "generalized_mutual_information"] as const;
	readonly description =
		"Generalized mutual information - log2-weighted divergence over the full 2x2 table";

	compute<T>(pair: ItemPair<T>): AssociationScore {
		const table = pair.table;
		return {
			name: this.name,
			value: table.mutualInformation(),
			details: { observed: table.observed(), expected: table.expected(), n: table.n },
		};
	}
}
