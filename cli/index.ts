#!/usr/bin/env tsx
/**
 * basketstats CLI entry point.
 * Provides commands for listing datasets and measures, ranking item pairs,
 * inspecting a single contingency table and simulating null corpora.
 */

import { writeFile } from "node:fs/promises";
import { stringify } from "yaml";
import { summarize } from "../core/analysis/statistics.ts";
import { generateNullCorpus } from "../core/analysis/simulate.ts";
import { computeContingencyTable } from "../core/association/contingency-table.ts";
import { getDefaultRegistry } from "../core/association/index.ts";
import {
	RankCommandOptionsSchema,
	SimulateCommandOptionsSchema,
	resolveDatasetsDir,
	type DatasetConfig,
} from "../core/config.ts";
import { vocabulary } from "../core/corpus.ts";
import {
	datasetCorpus,
	formatZodIssues,
	getDatasetRegistry,
	loadDatasetFile,
} from "../core/datasets.ts";
import { rankPairs, scorePairs } from "../core/ranking.ts";
import { parseArgs, toOptionalString, toStringArray, type OptionValue } from "./args.ts";
import { rankingToCsv, rankingToJson } from "./export.ts";
import { formatContingencyTable, formatRankingTable, formatScore } from "./table.ts";

type Options = Record<string, OptionValue>;

/**
 * Print help message.
 */
function printHelp(): void {
	console.log(`
╭─────────────────────────────────────────────────────────────────╮
│                          BASKETSTATS                            │
│        Pairwise association strength for market baskets         │
╰─────────────────────────────────────────────────────────────────╯

Usage:
  basketstats <command> [arguments] [options]

Positional arguments go before any option; an option takes every value
that follows it.

Commands:
  list              List available datasets and measures
  describe <name>   Describe a measure or a dataset
  rank              Score and rank every item pair of a dataset
  inspect <a> <b>   Show the contingency table for one pair
  simulate          Generate a corpus under the independence hypothesis
  help              Show this help message

Dataset selection (rank, inspect):
  --dataset <name>        Dataset discovered in the datasets directory
  --file <path>           Dataset file (YAML or JSON)
  --datasets-dir <path>   Datasets directory (default: $BASKETSTATS_DATASETS_DIR or ./datasets)

Rank options:
  --measures <names>      Measures to compute (default: all)
  --sort-by <measure>     Measure to sort by (default: llr)
  --order desc|asc        Most associated first (desc) or most dissociated (asc)
  --limit <n>             Keep the top n pairs
  --min-cooccurrence <n>  Skip pairs seen together fewer than n times
  --format table|json|csv
  --output <path>         Write to a file instead of stdout

Simulate options:
  --items <labels>        Items to draw (at least two)
  --probability <p>       Chance of each item in each basket (default: 0.3)
  --baskets <n>           Number of baskets (default: 1000)
  --seed <n>              PRNG seed (default: 42)
  --output <path>         Write the corpus as a dataset YAML file

Measures:
  lmi    Local mutual information (co-occurrence cell only)
  mi     Generalized mutual information (full 2x2 table)
  llr    Log-likelihood ratio, G2 (full 2x2 table)

Examples:
  basketstats list
  basketstats describe llr
  basketstats rank --dataset groceries --sort-by mi --limit 10
  basketstats rank --dataset groceries --order asc --format csv --output dissociated.csv
  basketstats inspect "Tennis Ball" "Tennis Racket" --dataset groceries
  basketstats simulate --items A B C D --baskets 5000 --seed 7
`);
}

/**
 * Exit with a message on stderr.
 */
function fail(message: string): never {
	console.error(`\n❌ ${message}\n`);
	process.exit(1);
}

/**
 * Load the dataset named by --file or --dataset.
 */
async function resolveDataset(options: Options): Promise<DatasetConfig> {
	const file = toOptionalString(options, "file");
	if (file) {
		return loadDatasetFile(file);
	}

	const name = toOptionalString(options, "dataset");
	if (!name) {
		fail("No dataset specified. Use --dataset <name> or --file <path>.");
	}

	const registry = await getDatasetRegistry(resolveDatasetsDir(toOptionalString(options, "datasets-dir")));
	return registry.getDataset(name);
}

/**
 * List command - list datasets and measures.
 */
async function listCommand(options: Options): Promise<void> {
	const showDatasets = options.datasets === true || !options.measures;
	const showMeasures = options.measures === true || !options.datasets;
	const tags = toStringArray(options.tags);

	if (showDatasets) {
		const registry = await getDatasetRegistry(resolveDatasetsDir(toOptionalString(options, "datasets-dir")));
		const datasets = registry.listDatasets({ tags });
		console.log("\n🧺 Datasets:");
		console.log("─".repeat(60));

		if (datasets.length === 0) {
			console.log("  No datasets found.");
		} else {
			for (const d of datasets) {
				const tagsStr = d.tags?.length ? ` [${d.tags.join(", ")}]` : "";
				console.log(`  ${d.name.padEnd(25)} ${d.displayName}${tagsStr}`);
				if (d.description) {
					console.log(`                            ${d.description}`);
				}
			}
		}
	}

	if (showMeasures) {
		console.log("\n📐 Measures:");
		console.log("─".repeat(60));
		for (const m of getDefaultRegistry().listMeasures()) {
			console.log(`  ${m.name.padEnd(25)} ${m.description ?? ""}`);
		}
	}

	console.log();
}

/**
 * Describe command - show details about a measure or dataset.
 */
async function describeCommand(name: string, options: Options): Promise<void> {
	const measures = getDefaultRegistry();
	const measure = measures.get(name);
	if (measure) {
		console.log(`\n📐 Measure: ${measure.name}`);
		console.log("─".repeat(60));
		if (measure.aliases?.length) console.log(`  Aliases:     ${measure.aliases.join(", ")}`);
		if (measure.description) console.log(`  Description: ${measure.description}`);
		console.log();
		return;
	}

	const registry = await getDatasetRegistry(resolveDatasetsDir(toOptionalString(options, "datasets-dir")));
	if (registry.hasDataset(name)) {
		const d = registry.getDataset(name);
		const corpus = datasetCorpus(d);
		console.log(`\n🧺 Dataset: ${d.displayName}`);
		console.log("─".repeat(60));
		console.log(`  Name:        ${d.name}`);
		if (d.description) console.log(`  Description: ${d.description}`);
		if (d.tags?.length) console.log(`  Tags:        ${d.tags.join(", ")}`);
		console.log(`  Baskets:     ${corpus.length}`);
		console.log(`  Items:       ${(d.items ?? vocabulary(corpus)).length}`);
		console.log();
		return;
	}

	fail(`Not found: '${name}' is not a known measure or dataset.`);
}

/**
 * Rank command - score every pair and print them sorted.
 */
async function rankCommand(options: Options): Promise<void> {
	const parsed = RankCommandOptionsSchema.safeParse({
		measures: toStringArray(options.measures),
		sortBy: toOptionalString(options, "sort-by"),
		order: toOptionalString(options, "order"),
		limit: toOptionalString(options, "limit"),
		minCooccurrence: toOptionalString(options, "min-cooccurrence"),
		format: toOptionalString(options, "format"),
		output: toOptionalString(options, "output"),
	});
	if (!parsed.success) {
		fail(`Invalid rank options:\n${formatZodIssues(parsed.error).join("\n")}`);
	}
	const rankOptions = parsed.data;

	const registry = getDefaultRegistry();
	const measures = registry
		.resolveMeasures(rankOptions.measures ?? registry.listMeasureNames())
		.map((m) => m.name);
	const sortBy = registry.getOrThrow(rankOptions.sortBy ?? (measures.includes("llr") ? "llr" : measures[0] ?? "llr")).name;
	if (!measures.includes(sortBy)) {
		measures.push(sortBy);
	}

	const dataset = await resolveDataset(options);
	const corpus = datasetCorpus(dataset);

	const scores = scorePairs(corpus, {
		measures,
		items: dataset.items,
		minCooccurrence: rankOptions.minCooccurrence,
	});
	const ranked = rankPairs(scores, sortBy, { order: rankOptions.order, limit: rankOptions.limit });

	let rendered: string;
	switch (rankOptions.format) {
		case "csv":
			rendered = rankingToCsv(ranked, measures);
			break;
		case "json":
			rendered = rankingToJson(ranked);
			break;
		case "table":
		default:
			rendered = formatRankingTable(ranked, {
				title: `${dataset.displayName}: ${scores.length} pairs by ${sortBy} (${rankOptions.order})`,
				measures,
			});
			break;
	}

	if (rankOptions.output) {
		await writeFile(rankOptions.output, `${rendered}\n`, "utf8");
		console.log(`\n✅ Ranking written to: ${rankOptions.output}\n`);
	} else {
		console.log(rendered);
	}
}

/**
 * Inspect command - contingency table and scores for one pair.
 */
async function inspectCommand(args: string[], options: Options): Promise<void> {
	const [itemA, itemB] = args;
	if (itemA === undefined || itemB === undefined) {
		fail("Please specify two items: inspect <itemA> <itemB>");
	}

	const dataset = await resolveDataset(options);
	const corpus = datasetCorpus(dataset);

	const known = new Set(dataset.items ?? vocabulary(corpus));
	for (const item of [itemA, itemB]) {
		if (!known.has(item)) {
			console.log(`⚠️  "${item}" does not appear in ${dataset.name}`);
		}
	}

	console.log();
	console.log(formatContingencyTable(computeContingencyTable(itemA, itemB, corpus), corpus));
	console.log();
}

/**
 * Simulate command - null-hypothesis corpus and its LLR spread.
 */
async function simulateCommand(options: Options): Promise<void> {
	const parsed = SimulateCommandOptionsSchema.safeParse({
		items: toStringArray(options.items),
		probability: toOptionalString(options, "probability"),
		baskets: toOptionalString(options, "baskets"),
		seed: toOptionalString(options, "seed"),
		output: toOptionalString(options, "output"),
	});
	if (!parsed.success) {
		fail(`Invalid simulate options:\n${formatZodIssues(parsed.error).join("\n")}`);
	}
	const { items, probability, baskets, seed, output } = parsed.data;

	const corpus = generateNullCorpus({
		items: items.map((item) => ({ item, probability })),
		baskets,
		seed,
	});
	const llr = scorePairs(corpus, { measures: ["llr"], items }).map((s) => s.scores.llr ?? 0);
	const summary = summarize(llr);

	console.log(`
╭─────────────────────────────────────────────────────────────────╮
│                 NULL-HYPOTHESIS SIMULATION                      │
├─────────────────────────────────────────────────────────────────┤
│ Items:       ${String(items.length).padEnd(51)}│
│ Baskets:     ${String(baskets).padEnd(51)}│
│ Probability: ${String(probability).padEnd(51)}│
│ Seed:        ${String(seed).padEnd(51)}│
├─────────────────────────────────────────────────────────────────┤
│ ${`LLR over ${summary.count} pairs`.padEnd(64)}│
│   mean ${formatScore(summary.mean).padEnd(57)}│
│   std  ${formatScore(summary.std).padEnd(57)}│
│   min  ${formatScore(summary.min).padEnd(57)}│
│   max  ${formatScore(summary.max).padEnd(57)}│
╰─────────────────────────────────────────────────────────────────╯
`);

	if (output) {
		const dataset = {
			name: `null-${seed}`,
			displayName: `Null corpus (seed ${seed})`,
			description: `${baskets} baskets, each item present with probability ${probability}`,
			tags: ["simulated"],
			items,
			baskets: corpus.map((basket) => Array.from(basket)),
		};
		await writeFile(output, stringify(dataset), "utf8");
		console.log(`✅ Corpus written to: ${output}\n`);
	}
}

/**
 * Main CLI entry point.
 */
async function main(): Promise<void> {
	const parsed = parseArgs(process.argv);

	switch (parsed.command) {
		case "help":
		case "--help":
		case "-h":
			printHelp();
			break;

		case "list":
			await listCommand(parsed.options);
			break;

		case "describe": {
			const name = parsed.args[0];
			if (!name) {
				fail("Please specify a measure or dataset name.");
			}
			await describeCommand(name, parsed.options);
			break;
		}

		case "rank":
			await rankCommand(parsed.options);
			break;

		case "inspect":
			await inspectCommand(parsed.args, parsed.options);
			break;

		case "simulate":
			await simulateCommand(parsed.options);
			break;

		default:
			console.error(`\n❌ Unknown command: ${parsed.command}\n`);
			printHelp();
			process.exit(1);
	}
}

// Run the CLI
main().catch((error: unknown) => {
	console.error("❌ Error:", error instanceof Error ? error.message : error);
	process.exit(1);
});
