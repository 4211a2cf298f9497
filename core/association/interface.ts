/**
 * Association measure interface for the measure registry.
 * Each measure is a small, self-contained calculator that can be
 * registered and invoked by name.
 */

import type { ItemPair } from "./pair.ts";

/**
 * Result of scoring one pair with one measure.
 */
export interface AssociationScore {
	name: string;
	value: number;
	details?: Record<string, unknown>;
}

/**
 * Interface for association measures.
 * Every measure is symmetric: swapping i and j gives the same value.
 */
export interface AssociationMeasure {
	/**
	 * Primary name of the measure (used for lookup and output).
	 */
	readonly name: string;

	/**
	 * Optional aliases that can also be used to invoke this measure.
	 */
	readonly aliases?: readonly string[];

	/**
	 * Human-readable description of what this measure captures.
	 */
	readonly description?: string;

	/**
	 * Score one pair of items.
	 */
	compute<T>(pair: ItemPair<T>): AssociationScore;
}
