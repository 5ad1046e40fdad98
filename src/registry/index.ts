import { NamedTypeRegistry } from "./NamedTypeRegistry";
import type { BenchmarkClass } from "../domain/benchmark/Benchmark";
import type { CollectorClass } from "../domain/collectors/Collector";

// Populated while plugin modules are evaluated; see src/features/index.ts.
export const TOOLS = new NamedTypeRegistry<BenchmarkClass>("tool", "toolName");
export const COLLECTORS = new NamedTypeRegistry<CollectorClass>("collector", "collectorName");

export const registerTool = TOOLS.registrar();
export const registerCollector = COLLECTORS.registrar();

export { NamedTypeRegistry } from "./NamedTypeRegistry";
export { RegistryError, MissingNameError, DuplicateNameError } from "./errors";
