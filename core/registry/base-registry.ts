/**
 * BaseRegistry - generic registry for pluggable components.
 *
 * - Key-based registration with optional aliases
 * - Lookup by key or alias
 * - Conflict detection on registration
 * - Listing helpers
 *
 * Used by: AssociationRegistry
 *
 * @example
 * ```typescript
 * class MeasureRegistry extends BaseRegistry<AssociationMeasure> {
 *   register(measure: AssociationMeasure): void {
 *     this.registerItem(measure.name, measure, measure.aliases);
 *   }
 * }
 * ```
 */

/**
 * Error thrown when a requested item is not found in the registry.
 */
export class RegistryNotFoundError extends Error {
	constructor(
		public readonly registryName: string,
		public readonly key: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super(`${registryName}: "${key}" not found. ${available}`);
		this.name = "RegistryNotFoundError";
	}
}

/**
 * Error thrown when registration conflicts with an existing entry.
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly registryName: string,
		public readonly key: string,
		public readonly conflictType: "key" | "alias",
	) {
		const type = conflictType === "key" ? "Key" : "Alias";
		super(`${registryName}: ${type} "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

export interface RegistryOptions {
	/** Used in error messages */
	name: string;
	/** Throw on duplicate registration instead of skipping (default: true) */
	throwOnConflict?: boolean;
}

/**
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected items = new Map<string, T>();
	protected aliasMap = new Map<string, string>(); // alias -> primary key
	protected readonly registryName: string;
	protected readonly throwOnConflict: boolean;

	constructor(options: RegistryOptions) {
		this.registryName = options.name;
		this.throwOnConflict = options.throwOnConflict ?? true;
	}

	/**
	 * Register an item under a key and optional aliases.
	 * When throwOnConflict is false a conflicting item is skipped entirely.
	 *
	 * @throws RegistryConflictError if the key or an alias is taken (throwOnConflict=true)
	 */
	protected registerItem(key: string, item: T, aliases: readonly string[] = []): void {
		const conflict = this.findConflict(key, aliases);
		if (conflict) {
			if (this.throwOnConflict) {
				throw new RegistryConflictError(this.registryName, conflict.name, conflict.type);
			}
			return;
		}

		this.items.set(key, item);
		for (const alias of aliases) {
			this.aliasMap.set(alias, key);
		}
	}

	/**
	 * Get an item by key or alias.
	 */
	get(keyOrAlias: string): T | undefined {
		return this.items.get(this.resolveAlias(keyOrAlias));
	}

	/**
	 * @throws RegistryNotFoundError if neither a key nor an alias matches
	 */
	getOrThrow(keyOrAlias: string): T {
		const item = this.get(keyOrAlias);
		if (item === undefined) {
			throw new RegistryNotFoundError(this.registryName, keyOrAlias, this.keys());
		}
		return item;
	}

	has(keyOrAlias: string): boolean {
		return this.items.has(keyOrAlias) || this.aliasMap.has(keyOrAlias);
	}

	/**
	 * Registered items, in registration order.
	 */
	list(): T[] {
		return Array.from(this.items.values());
	}

	/**
	 * Primary keys, sorted.
	 */
	keys(): string[] {
		return Array.from(this.items.keys()).sort();
	}

	/**
	 * Aliases, sorted.
	 */
	aliases(): string[] {
		return Array.from(this.aliasMap.keys()).sort();
	}

	/**
	 * Number of registered items (aliases not counted).
	 */
	get size(): number {
		return this.items.size;
	}

	/**
	 * Remove an item by primary key, with its aliases.
	 */
	delete(key: string): boolean {
		if (!this.items.has(key)) {
			return false;
		}

		for (const [alias, primaryKey] of this.aliasMap.entries()) {
			if (primaryKey === key) {
				this.aliasMap.delete(alias);
			}
		}

		this.items.delete(key);
		return true;
	}

	clear(): void {
		this.items.clear();
		this.aliasMap.clear();
	}

	/**
	 * Primary key for an alias; anything else is returned unchanged.
	 */
	resolveAlias(keyOrAlias: string): string {
		if (this.items.has(keyOrAlias)) return keyOrAlias;
		return this.aliasMap.get(keyOrAlias) ?? keyOrAlias;
	}

	private findConflict(
		key: string,
		aliases: readonly string[],
	): { name: string; type: "key" | "alias" } | undefined {
		if (this.has(key)) {
			return { name: key, type: "key" };
		}
		const alias = aliases.find((a) => this.has(a) || a === key);
		return alias === undefined ? undefined : { name: alias, type: "alias" };
	}
}
