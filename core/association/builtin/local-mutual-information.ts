/**
 * Local mutual information measure.
 *
 * Formula:
 *   LMI = log2(O / E),   E = freq(i) · freq(j) / total item occurrences
 *
 * Exactly 0 when the items never co-occur. Insensitive to sample size,
 * so rare items can score high on a single co-occurrence; prefer mi or
 * llr when ranking sparse data.
 */

import type { AssociationMeasure, AssociationScore } from "../interface.ts";
import type { ItemPair } from "../pair.ts";
import { localMutualInformationDetails } from "../local-mutual-information.ts";

export class LocalMutualInformationMeasure implements AssociationMeasure {
	readonly name = "lmi";
	readonly aliases = ["local_mutual_information", "local-mi"] as const;
	readonly description =
		"Local mutual information - log2 ratio of observed to expected co-occurrence";

	compute<T>(pair: ItemPair<T>): AssociationScore {
		const { value, ...details } = localMutualInformationDetails(pair.i, pair.j, pair.corpus);
		return { name: this.name, value, details };
	}
}
