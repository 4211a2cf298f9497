/**
 * Dataset registry: discovers basket datasets from a directory of
 * YAML/JSON files and validates them against DatasetConfigSchema.
 */

import { readFile } from "node:fs/promises";
import { glob } from "glob";
import { parse } from "yaml";
import type { ZodError } from "zod";
import { DatasetConfigSchema, type DatasetConfig } from "./config.ts";
import { createCorpus, type Corpus } from "./corpus.ts";
import { DatasetValidationError } from "./errors.ts";

/**
 * Format Zod issues one per line, prefixed with their path.
 */
export function formatZodIssues(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `  - ${path ? `${path}: ` : ""}${issue.message}`;
	});
}

/**
 * Parse and validate dataset file contents.
 * @throws DatasetValidationError if the text is not YAML/JSON or fails the schema
 */
export function parseDataset(content: string, filePath: string): DatasetConfig {
	let raw: unknown;
	try {
		raw = parse(content);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new DatasetValidationError(filePath, [`  - ${message}`]);
	}

	const result = DatasetConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new DatasetValidationError(filePath, formatZodIssues(result.error));
	}
	return result.data;
}

/**
 * Load a single dataset file.
 * @throws DatasetValidationError if the file fails to parse or validate
 */
export async function loadDatasetFile(filePath: string): Promise<DatasetConfig> {
	const content = await readFile(filePath, "utf8");
	return parseDataset(content, filePath);
}

/**
 * Baskets of a dataset as a corpus.
 */
export function datasetCorpus(dataset: DatasetConfig): Corpus<string> {
	return createCorpus(dataset.baskets);
}

export class DatasetRegistry {
	private datasets = new Map<string, DatasetConfig>();
	private readonly basePath: string;

	constructor(basePath: string) {
		this.basePath = basePath;
	}

	/**
	 * Load every dataset under the base path. Files that fail to parse or
	 * validate are reported on stderr and skipped, as are later files
	 * reusing a name.
	 */
	async discover(): Promise<void> {
		// cwd keeps glob syntax in the directory name literal
		const files = await glob("**/*.{yaml,yml,json}", { cwd: this.basePath, absolute: true, nodir: true });

		for (const file of files.sort()) {
			try {
				const config = await loadDatasetFile(file);
				if (this.datasets.has(config.name)) {
					console.error(`Skipping ${file}: dataset "${config.name}" is already defined`);
					continue;
				}
				this.datasets.set(config.name, config);
			} catch (error) {
				if (error instanceof DatasetValidationError) {
					console.error(error.message);
				} else {
					console.error(`Failed to load dataset from ${file}:`, error);
				}
			}
		}
	}

	/**
	 * @throws Error listing the available datasets when the name is unknown
	 */
	getDataset(name: string): DatasetConfig {
		const config = this.datasets.get(name);
		if (!config) {
			const available = this.getDatasetNames().join(", ");
			throw new Error(`Unknown dataset: ${name}. Available datasets: ${available || "none"}`);
		}
		return config;
	}

	hasDataset(name: string): boolean {
		return this.datasets.has(name);
	}

	/**
	 * Datasets sorted by name, optionally keeping those with any of the tags.
	 */
	listDatasets(options: { tags?: string[] } = {}): DatasetConfig[] {
		const tags = options.tags ?? [];
		const datasets = Array.from(this.datasets.values()).sort((a, b) =>
			a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
		);
		if (tags.length === 0) {
			return datasets;
		}
		return datasets.filter((d) => tags.some((tag) => d.tags?.includes(tag)));
	}

	getDatasetNames(): string[] {
		return this.listDatasets().map((d) => d.name);
	}

	/**
	 * Register a dataset programmatically (useful for testing).
	 */
	registerDataset(config: DatasetConfig): void {
		this.datasets.set(config.name, config);
	}
}

// Discovered once per directory for the lifetime of the process
const registries = new Map<string, DatasetRegistry>();

export async function getDatasetRegistry(basePath: string): Promise<DatasetRegistry> {
	let registry = registries.get(basePath);
	if (!registry) {
		registry = new DatasetRegistry(basePath);
		await registry.discover();
		registries.set(basePath, registry);
	}
	return registry;
}

export function resetDatasetRegistry(): void {
	registries.clear();
}
