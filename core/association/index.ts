/**
 * Association module - contingency tables, the measure registry
 * and the built-in measures.
 */

export * from "./contingency-table.ts";
export * from "./local-mutual-information.ts";
export * from "./pair.ts";
export * from "./interface.ts";
export * from "./registry.ts";
export * from "./builtin/index.ts";

import { AssociationRegistry } from "./registry.ts";
import { getBuiltinMeasures } from "./builtin/index.ts";

let _defaultRegistry: AssociationRegistry | null = null;

/**
 * Shared registry with every built-in measure.
 */
export function getDefaultRegistry(): AssociationRegistry {
	if (!_defaultRegistry) {
		_defaultRegistry = createRegistry();
	}
	return _defaultRegistry;
}

/**
 * Fresh registry with the built-in measures, for callers that
 * register their own.
 */
export function createRegistry(): AssociationRegistry {
	const registry = new AssociationRegistry();
	for (const measure of getBuiltinMeasures()) {
		registry.register(measure);
	}
	return registry;
}

export function getAvailableMeasures(): string[] {
	return getDefaultRegistry().listMeasureNames();
}
