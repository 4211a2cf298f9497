/**
 * A pair of items bound to the corpus they are scored against.
 */

import type { Corpus, Item } from "../corpus.ts";
import { assertDistinctItems } from "../corpus.ts";
import { ContingencyTable } from "./contingency-table.ts";

/**
 * Shared input to every association measure. The contingency table is
 * built on first access and reused, so table-based measures queried on
 * the same pair tabulate the corpus once.
 */
export class ItemPair<T = Item> {
	private cachedTable: ContingencyTable<T> | undefined;

	/**
	 * @throws InvalidInputError when i === j
	 */
	constructor(
		readonly i: T,
		readonly j: T,
		readonly corpus: Corpus<T>,
	) {
		assertDistinctItems(i, j);
	}

	/**
	 * @throws InvalidInputError when the corpus is empty
	 */
	get table(): ContingencyTable<T> {
		if (!this.cachedTable) {
			this.cachedTable = new ContingencyTable(this.i, this.j, this.corpus);
		}
		return this.cachedTable;
	}
}
