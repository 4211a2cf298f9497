/**
 * Command-line argument parsing for the basketstats CLI.
 */

export type OptionValue = string | string[] | boolean;

export interface ParsedArgs {
	command: string;
	args: string[];
	options: Record<string, OptionValue>;
}

/**
 * A leading "-" starts an option unless a digit follows it, so negative
 * numbers stay values (`--seed -5`).
 */
function isOption(arg: string): boolean {
	return arg.startsWith("-") && !/^-\d/.test(arg);
}

/**
 * Parse argv (including the runtime and script entries).
 *
 * `--key a b` and `-k a b` collect every following value up to the next
 * option; an option with no value is a boolean flag.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const args = argv.slice(2);
	const command = args[0] ?? "help";
	const restArgs: string[] = [];
	const options: Record<string, OptionValue> = {};

	let index = 1;
	while (index < args.length) {
		const arg = args[index] ?? "";
		index++;

		if (!isOption(arg)) {
			if (arg) restArgs.push(arg);
			continue;
		}

		const key = arg.startsWith("--") ? arg.slice(2) : arg.slice(1);
		const values: string[] = [];
		for (let next = args[index]; next !== undefined && next !== "" && !isOption(next); next = args[index]) {
			values.push(next);
			index++;
		}

		if (values.length === 0) {
			options[key] = true;
		} else {
			options[key] = values.length === 1 ? values[0] ?? "" : values;
		}
	}

	return { command, args: restArgs, options };
}

/**
 * Option value as a list. Comma-separated values are split
 * ("a,b" → ["a", "b"]); booleans and absent options give undefined.
 */
export function toStringArray(value: OptionValue | undefined): string[] | undefined {
	if (value === undefined || typeof value === "boolean") return undefined;
	const values = Array.isArray(value) ? value : [value];
	return values.flatMap((v) => v.split(",").map((s) => s.trim())).filter(Boolean);
}

/**
 * Value of a single-valued option.
 * @throws Error when the option was given several values; positional
 * arguments placed after it end up there
 */
export function toOptionalString(options: Record<string, OptionValue>, key: string): string | undefined {
	const value = options[key];
	if (value === undefined || typeof value === "boolean") return undefined;
	if (!Array.isArray(value)) return value;
	if (value.length > 1) {
		throw new Error(
			`Option --${key} takes a single value, got ${value.length}: ${value.join(", ")}. Positional arguments go before options.`,
		);
	}
	return value[0];
}
