import type { CommandModule } from "./types";
import Irrigate from "./irrigate";
import Fertilize from "./fertilize";
import SoilSample from "./soil-sample";

const modules: readonly CommandModule[] = [Irrigate, Fertilize, SoilSample];

const registry = new Map<string, CommandModule>();
for (const mod of modules) {
	registry.set(mod.type, mod);
	for (const alias of mod.aliases) {
		registry.set(alias, mod);
	}
}

/** Canonical command types, in registration order. */
export const COMMAND_TYPES: readonly string[] = modules.map(m => m.type);

/**
 * Resolve a command module by command_type or alias.
 * Returns undefined for unknown types.
 */
export function findCommandModule(type: string): CommandModule | undefined {
	return registry.get(type.trim().toLowerCase());
}
