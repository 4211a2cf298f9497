/**
 * Configuration schemas for basketstats.
 * Defines Zod schemas for dataset files and command options.
 */

import { z } from "zod";

// ============================================================================
// Dataset Schema
// ============================================================================

/**
 * Item labels may be written as bare numbers in YAML; they are kept as strings.
 */
const ItemLabelSchema = z.union([z.string().min(1), z.number()]).transform(String);

const BasketSchema = z.array(ItemLabelSchema);

export const DatasetConfigSchema = z
	.object({
		// Identity
		name: z.string().min(1),
		displayName: z.string(),
		description: z.string().optional(),
		tags: z.array(z.string()).optional(),

		// Declared vocabulary; when present every basket item must belong to it
		items: z.array(ItemLabelSchema).optional(),

		baskets: z.array(BasketSchema).min(1, "dataset must contain at least one basket"),
	})
	.superRefine((config, ctx) => {
		if (!config.items) return;
		const known = new Set(config.items);
		config.baskets.forEach((basket, index) => {
			for (const item of basket) {
				if (!known.has(item)) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						path: ["baskets", index],
						message: `unknown item "${item}" (not listed in items)`,
					});
				}
			}
		});
	});

export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;

// ============================================================================
// Command Options
// ============================================================================

export const RankCommandOptionsSchema = z.object({
	measures: z.array(z.string()).min(1).optional(),
	sortBy: z.string().optional(),
	order: z.enum(["asc", "desc"]).default("desc"),
	limit: z.coerce.number().int().positive().optional(),
	minCooccurrence: z.coerce.number().int().nonnegative().optional(),
	format: z.enum(["table", "json", "csv"]).default("table"),
	output: z.string().optional(),
});

export type RankCommandOptions = z.infer<typeof RankCommandOptionsSchema>;

export const SimulateCommandOptionsSchema = z.object({
	items: z.array(z.string()).min(2, "at least two items are needed to form a pair"),
	probability: z.coerce.number().min(0).max(1).default(0.3),
	baskets: z.coerce.number().int().positive().default(1000),
	seed: z.coerce.number().int().default(42),
	output: z.string().optional(),
});

export type SimulateCommandOptions = z.infer<typeof SimulateCommandOptionsSchema>;

// ============================================================================
// Environment
// ============================================================================

export const DEFAULT_DATASETS_DIR = "./datasets";

/**
 * Datasets directory: explicit flag, then BASKETSTATS_DATASETS_DIR, then ./datasets.
 */
export function resolveDatasetsDir(flag?: string): string {
	if (flag && flag.trim() !== "") return flag;
	const fromEnv = process.env.BASKETSTATS_DATASETS_DIR;
	if (fromEnv !== undefined && fromEnv.trim() !== "") return fromEnv;
	return DEFAULT_DATASETS_DIR;
}
