/**
 * CSV and JSON export of ranked pair scores.
 */

import type { PairScore } from "../core/ranking.ts";

function quote(value: string): string {
	return `"${value.replace(/"/g, '""')}"`;
}

/**
 * One row per pair; item labels are always quoted, scores written
 * at full precision.
 */
export function rankingToCsv<T>(ranked: readonly PairScore<T>[], measures: readonly string[]): string {
	const headers = ["item_i", "item_j", "cooccurrences", ...measures];

	const rows = ranked.map((r) => [
		quote(String(r.i)),
		quote(String(r.j)),
		r.cooccurrences.toString(),
		...measures.map((m) => {
			const value = r.scores[m];
			return value === undefined ? "" : value.toString();
		}),
	]);

	return [headers.join(","), ...rows.map((r) => r.join(","))].join("\n");
}

export function rankingToJson<T>(ranked: readonly PairScore<T>[]): string {
	return JSON.stringify(ranked, null, 2);
}
