/**
 * Association Registry - central registry for association measures.
 *
 * Extends BaseRegistry for registration, alias lookup and conflict checks.
 */

import type { AssociationMeasure, AssociationScore } from "./interface.ts";
import type { ItemPair } from "./pair.ts";
import { BaseRegistry, RegistryNotFoundError } from "../registry/index.ts";

export class AssociationRegistry extends BaseRegistry<AssociationMeasure> {
	constructor() {
		super({ name: "AssociationRegistry", throwOnConflict: true });
	}

	/**
	 * @throws RegistryConflictError if the name or any alias is already registered
	 */
	register(measure: AssociationMeasure): void {
		this.registerItem(measure.name, measure, measure.aliases);
	}

	/**
	 * Score a pair with a single measure.
	 * @throws RegistryNotFoundError if the measure is not registered
	 */
	compute<T>(nameOrAlias: string, pair: ItemPair<T>): AssociationScore {
		return this.getOrThrow(nameOrAlias).compute(pair);
	}

	/**
	 * Score a pair with several measures. All names are validated before
	 * anything is computed; a measure requested by name and alias runs once.
	 * @throws RegistryNotFoundError if any measure is not registered
	 */
	computeAll<T>(names: readonly string[], pair: ItemPair<T>): AssociationScore[] {
		return this.resolveMeasures(names).map((measure) => measure.compute(pair));
	}

	/**
	 * Distinct measures for the given names, in request order.
	 * @throws RegistryNotFoundError if any measure is not registered
	 */
	resolveMeasures(names: readonly string[]): AssociationMeasure[] {
		this.validateMeasures(names);

		const resolved: AssociationMeasure[] = [];
		const seen = new Set<string>();
		for (const nameOrAlias of names) {
			const measure = this.getOrThrow(nameOrAlias);
			if (seen.has(measure.name)) {
				continue;
			}
			seen.add(measure.name);
			resolved.push(measure);
		}
		return resolved;
	}

	/**
	 * @throws RegistryNotFoundError naming the first unknown measure
	 */
	validateMeasures(names: readonly string[]): void {
		for (const name of names) {
			if (!this.has(name)) {
				throw new RegistryNotFoundError(this.registryName, name, this.keys());
			}
		}
	}

	/**
	 * Primary names only, no aliases.
	 */
	listMeasureNames(): string[] {
		return this.keys();
	}

	listMeasures(): AssociationMeasure[] {
		return this.list();
	}
}
