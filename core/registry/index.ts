/**
 * Registry module - shared registration, lookup and alias handling
 * for pluggable components.
 */

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
	type RegistryOptions,
} from "./base-registry.ts";
