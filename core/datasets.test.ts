import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	datasetCorpus,
	DatasetRegistry,
	getDatasetRegistry,
	loadDatasetFile,
	parseDataset,
	resetDatasetRegistry,
} from "./datasets.ts";
import { DatasetValidationError } from "./errors.ts";
import { rankPairs, scorePairs } from "./ranking.ts";

function thrownBy(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	return undefined;
}

describe("parseDataset", () => {
	it("reads YAML", () => {
		const config = parseDataset(
			["name: pantry", "displayName: Pantry", "baskets:", "  - [rice, beans]", "  - [rice]"].join("\n"),
			"pantry.yaml",
		);

		expect(config.name).toBe("pantry");
		expect(datasetCorpus(config)).toEqual([new Set(["rice", "beans"]), new Set(["rice"])]);
	});

	it("reads JSON", () => {
		const config = parseDataset(
			JSON.stringify({ name: "json", displayName: "JSON", baskets: [["x", "y"]] }),
			"json.json",
		);

		expect(config.baskets).toEqual([["x", "y"]]);
	});

	it("lists every schema issue with its path", () => {
		const error = thrownBy(() =>
			parseDataset(
				["displayName: Broken", "items: [milk]", "baskets:", "  - [milk]", "  - [mlik]"].join("\n"),
				"broken.yaml",
			),
		);

		expect(error).toBeInstanceOf(DatasetValidationError);
		expect(error).toMatchObject({
			filePath: "broken.yaml",
			issues: ["  - name: Required"],
		});
	});

	it("reports vocabulary violations once the shape is valid", () => {
		const error = thrownBy(() =>
			parseDataset(
				["name: typo", "displayName: Typo", "items: [milk]", "baskets:", "  - [milk]", "  - [mlik]"].join("\n"),
				"typo.yaml",
			),
		);

		expect(error).toBeInstanceOf(DatasetValidationError);
		if (error instanceof DatasetValidationError) {
			expect(error.message).toBe(
				'Validation failed for typo.yaml:\n  - baskets.1: unknown item "mlik" (not listed in items)',
			);
		}
	});

	it("wraps syntax errors", () => {
		const error = thrownBy(() => parseDataset("name: [unclosed", "bad.yaml"));

		expect(error).toBeInstanceOf(DatasetValidationError);
		expect(error).toMatchObject({ filePath: "bad.yaml" });
	});
});

describe("DatasetRegistry", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "basketstats-"));
		await mkdir(join(dir, "nested"));
		await writeFile(
			join(dir, "a.yaml"),
			["name: alpha", "displayName: Alpha", "tags: [fruit]", "baskets:", "  - [apple, pear]"].join("\n"),
		);
		await writeFile(
			join(dir, "nested", "b.json"),
			JSON.stringify({ name: "beta", displayName: "Beta", tags: ["dairy"], baskets: [["milk"]] }),
		);
		await writeFile(join(dir, "broken.yaml"), ["displayName: Broken", "baskets:", "  - [x]"].join("\n"));
		await writeFile(join(dir, "z-dup.yml"), ["name: alpha", "displayName: Again", "baskets:", "  - [y]"].join("\n"));
		await writeFile(join(dir, "notes.txt"), "not a dataset");
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		resetDatasetRegistry();
		await rm(dir, { recursive: true, force: true });
	});

	it("discovers valid datasets and skips broken or duplicate ones", async () => {
		const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const registry = new DatasetRegistry(dir);

		await registry.discover();

		expect(registry.getDatasetNames()).toEqual(["alpha", "beta"]);
		expect(registry.getDataset("alpha").displayName).toBe("Alpha");
		expect(errors).toHaveBeenCalledTimes(2);
		expect(errors).toHaveBeenLastCalledWith(
			`Skipping ${join(dir, "z-dup.yml")}: dataset "alpha" is already defined`,
		);
	});

	it("finds datasets under a directory whose name contains glob syntax", async () => {
		const special = join(dir, "shop [2024] (copy)");
		await mkdir(special);
		await writeFile(
			join(special, "c.yaml"),
			["name: gamma", "displayName: Gamma", "baskets:", "  - [tea]"].join("\n"),
		);
		const registry = new DatasetRegistry(special);

		await registry.discover();

		expect(registry.getDatasetNames()).toEqual(["gamma"]);
	});

	it("filters by tag", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		const registry = new DatasetRegistry(dir);
		await registry.discover();

		expect(registry.listDatasets({ tags: ["dairy"] }).map((d) => d.name)).toEqual(["beta"]);
		expect(registry.listDatasets({ tags: ["fruit", "dairy"] })).toHaveLength(2);
	});

	it("names the available datasets for an unknown one", () => {
		const registry = new DatasetRegistry(dir);
		registry.registerDataset({ name: "one", displayName: "One", baskets: [["a"]] });

		expect(registry.hasDataset("one")).toBe(true);
		expect(() => registry.getDataset("two")).toThrow("Unknown dataset: two. Available datasets: one");
		expect(() => new DatasetRegistry(dir).getDataset("two")).toThrow(
			"Unknown dataset: two. Available datasets: none",
		);
	});

	it("discovers each directory once", async () => {
		vi.spyOn(console, "error").mockImplementation(() => undefined);

		const first = await getDatasetRegistry(dir);
		expect(await getDatasetRegistry(dir)).toBe(first);

		resetDatasetRegistry();
		expect(await getDatasetRegistry(dir)).not.toBe(first);
	});
});

describe("bundled datasets", () => {
	const datasetsDir = fileURLToPath(new URL("../datasets/", import.meta.url));

	it("ranks the paired groceries highest by log-likelihood", async () => {
		const groceries = await loadDatasetFile(join(datasetsDir, "groceries.yaml"));
		const corpus = datasetCorpus(groceries);

		expect(corpus).toHaveLength(30);
		expect(groceries.items).toHaveLength(9);

		const top = rankPairs(scorePairs(corpus, { measures: ["llr"] }), "llr", { limit: 3 });
		expect(top.map((p) => `${p.i} + ${p.j}`)).toEqual([
			"Laundry Detergent + Softener",
			"Tennis Ball + Tennis Racket",
			"Car + Screwdriver",
		]);
		expect(top[1]?.scores.llr).toBeCloseTo(19.505, 3);
	});

	it("keeps the toy pair exactly independent", async () => {
		const toy = await loadDatasetFile(join(datasetsDir, "toy.yaml"));
		const [ab] = scorePairs(datasetCorpus(toy), { measures: ["mi", "lmi"], items: ["A", "B"] });

		expect(ab?.scores.mi).toBe(0);
		expect(ab?.scores.lmi).toBeCloseTo(Math.log2(1.25), 12);
	});
});
