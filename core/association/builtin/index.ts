/**
 * Built-in association measures, registered by default.
 *
 * - lmi: local mutual information (co-occurrence cell only)
 * - mi:  generalized mutual information (full contingency table)
 * - llr: log-likelihood ratio (full contingency table)
 */

export * from "./local-mutual-information.ts";
export * from "./mutual-information.ts";
export * from "./log-likelihood.ts";

import { LocalMutualInformationMeasure } from "./local-mutual-information.ts";
import { MutualInformationMeasure } from "./mutual-information.ts";
import { LogLikelihoodMeasure } from "./log-likelihood.ts";
import type { AssociationMeasure } from "../interface.ts";

export function getBuiltinMeasures(): AssociationMeasure[] {
	return [
		new LocalMutualInformationMeasure(),
		new MutualInformationMeasure(),
		new LogLikelihoodMeasure(),
	];
}
