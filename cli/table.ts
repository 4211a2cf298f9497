/**
 * Table rendering for ranked pair scores and contingency tables.
 *
 * Every formatter returns the text instead of printing it, so the same
 * rendering goes to stdout or to an --output file.
 */

import type { ContingencyTable } from "../core/association/contingency-table.ts";
import { localMutualInformation } from "../core/association/local-mutual-information.ts";
import type { Corpus } from "../core/corpus.ts";
import type { PairScore } from "../core/ranking.ts";
import { mean } from "../core/analysis/statistics.ts";

const MEASURE_COL_WIDTH = 10;
const COOCCURRENCE_LABEL = "Co-occ";

/**
 * Scores are log-ratios, printed with four decimals.
 */
export function formatScore(value: number): string {
	return value.toFixed(4);
}

export interface RankingTableOptions {
	title: string;
	measures: readonly string[];
}

/**
 * Box-drawn ranking with one column per measure and a mean row.
 */
export function formatRankingTable<T>(
	ranked: readonly PairScore<T>[],
	options: RankingTableOptions,
): string {
	const { title, measures } = options;

	// Column widths
	const rankColWidth = Math.max(1, String(ranked.length).length);
	const itemAColWidth = ranked.reduce((w, r) => Math.max(w, String(r.i).length), "Item A".length);
	const itemBColWidth = ranked.reduce((w, r) => Math.max(w, String(r.j).length), "Item B".length);
	const measureWidths = measures.map((m) => Math.max(MEASURE_COL_WIDTH, m.length));

	const formatRow = (rank: string, itemA: string, itemB: string, cooc: string, values: string[]): string =>
		[
			rank.padStart(rankColWidth),
			itemA.padEnd(itemAColWidth),
			itemB.padEnd(itemBColWidth),
			cooc.padStart(COOCCURRENCE_LABEL.length),
			...values.map((v, index) => v.padStart(measureWidths[index] ?? MEASURE_COL_WIDTH)),
		].join(" │ ");

	const headerLine = formatRow("#", "Item A", "Item B", COOCCURRENCE_LABEL, [...measures]);
	const innerWidth = headerLine.length + 2;
	const border = (left: string, right: string): string => left + "─".repeat(innerWidth) + right;
	const line = (content: string): string => "│ " + content.padEnd(innerWidth - 2) + " │";

	const lines = [
		border("╭", "╮"),
		line(title),
		border("├", "┤"),
		line(headerLine),
		border("├", "┤"),
	];

	if (ranked.length === 0) {
		lines.push(line("No pairs to rank."));
	}

	ranked.forEach((entry, index) => {
		const values = measures.map((m) => {
			const value = entry.scores[m];
			return value === undefined ? "-" : formatScore(value);
		});
		lines.push(line(formatRow(String(index + 1), String(entry.i), String(entry.j), String(entry.cooccurrences), values)));
	});

	lines.push(border("├", "┤"));
	const means = measures.map((m) => {
		const values = ranked.flatMap((entry) => {
			const value = entry.scores[m];
			return value === undefined ? [] : [value];
		});
		return values.length === 0 ? "-" : formatScore(mean(values));
	});
	lines.push(line(formatRow("", "Mean", "", "", means)));
	lines.push(border("╰", "╯"));

	return lines.join("\n");
}

/**
 * Observed and expected tables for one pair, followed by its three scores.
 */
export function formatContingencyTable<T>(table: ContingencyTable<T>, corpus: Corpus<T>): string {
	const lmi = localMutualInformation(table.i, table.j, corpus);
	return [
		`📊 Contingency table: ${String(table.i)} × ${String(table.j)}`,
		"─".repeat(60),
		table.toString(),
		"",
		`  mi:  ${formatScore(table.mutualInformation())}`,
		`  llr: ${formatScore(table.logLikelihood())}`,
		`  lmi: ${formatScore(lmi)}`,
	].join("\n");
}
