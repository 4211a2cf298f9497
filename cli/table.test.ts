import { describe, expect, it } from "vitest";
import { formatContingencyTable, formatRankingTable, formatScore } from "./table.ts";
import { rankingToCsv, rankingToJson } from "./export.ts";
import { computeContingencyTable } from "../core/association/index.ts";
import { createCorpus } from "../core/corpus.ts";
import type { PairScore } from "../core/ranking.ts";

const ranked: PairScore[] = [
	{ i: "Tennis Ball", j: "Tennis Racket", cooccurrences: 3, scores: { lmi: 4.643856, llr: 19.504978 } },
	{ i: "Car", j: "Flour", cooccurrences: 1, scores: { lmi: 0.251539, llr: 1.190066 } },
];

describe("formatScore", () => {
	it("prints four decimals", () => {
		expect(formatScore(0)).toBe("0.0000");
		expect(formatScore(-0.58496)).toBe("-0.5850");
	});
});

describe("formatRankingTable", () => {
	it("draws one row per pair and a mean row", () => {
		expect(formatRankingTable(ranked, { title: "Top pairs", measures: ["lmi", "llr"] }).split("\n")).toEqual([
			"╭────────────────────────────────────────────────────────────────────╮",
			"│ Top pairs                                                          │",
			"├────────────────────────────────────────────────────────────────────┤",
			"│ # │ Item A      │ Item B        │ Co-occ │        lmi │        llr │",
			"├────────────────────────────────────────────────────────────────────┤",
			"│ 1 │ Tennis Ball │ Tennis Racket │      3 │     4.6439 │    19.5050 │",
			"│ 2 │ Car         │ Flour         │      1 │     0.2515 │     1.1901 │",
			"├────────────────────────────────────────────────────────────────────┤",
			"│   │ Mean        │               │        │     2.4477 │    10.3475 │",
			"╰────────────────────────────────────────────────────────────────────╯",
		]);
	});

	it("renders rankings longer than the argument limit", () => {
		const many: PairScore[] = Array.from({ length: 200_000 }, (_, k) => ({
			i: `a${k}`,
			j: "b",
			cooccurrences: 1,
			scores: { mi: 1 },
		}));

		const lines = formatRankingTable(many, { title: "Many", measures: ["mi"] }).split("\n");

		expect(lines).toHaveLength(200_008);
		expect(lines[5]).toBe("│      1 │ a0      │ b      │      1 │     1.0000 │");
	});

	it("says so when there is nothing to rank", () => {
		const lines = formatRankingTable([], { title: "Empty", measures: ["mi"] }).split("\n");

		expect(lines[5]).toBe("│ No pairs to rank.                         │");
		expect(lines[7]).toBe("│   │ Mean   │        │        │          - │");
	});
});

describe("formatContingencyTable", () => {
	it("prints both tables and the three scores", () => {
		const corpus = createCorpus([["A", "B"], ["A"], ["B"], ["C"]]);
		const lines = formatContingencyTable(computeContingencyTable("A", "B", corpus), corpus).split("\n");

		expect(lines[0]).toBe("📊 Contingency table: A × B");
		expect(lines[2]).toBe("Observations:");
		expect(lines.slice(-3)).toEqual(["  mi:  0.0000", "  llr: 0.0000", "  lmi: 0.3219"]);
	});
});

describe("export", () => {
	it("writes CSV with quoted labels and full-precision scores", () => {
		const rows: PairScore[] = [{ i: 'Say "hi"', j: "B", cooccurrences: 1, scores: { lmi: 0.5 } }];

		expect(rankingToCsv(rows, ["lmi", "mi"])).toBe(
			'item_i,item_j,cooccurrences,lmi,mi\n"Say ""hi""","B",1,0.5,',
		);
	});

	it("writes JSON that reads back to the same scores", () => {
		expect(JSON.parse(rankingToJson(ranked))).toEqual(ranked);
	});
});
