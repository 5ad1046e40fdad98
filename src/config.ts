import fs from "fs";
import path from "path";

export interface HarnessConfig {
  tool?: string;
  collectors?: string[];
  outputFile?: string;
}

const DEFAULT_CONFIG_FILENAMES = ["benchmark.config.json", "harness.config.json"];

export interface LoadedConfig {
  config: HarnessConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
      return { config: normalizeConfig(raw, resolved), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

export function normalizeCollectorNames(input: unknown): string[] {
  if (!Array.isArray(input)) return [];
  return Array.from(
    new Set(
      input
        .map((name) => (typeof name === "string" ? name.trim() : ""))
        .filter((name) => name.length > 0)
    )
  );
}

function normalizeConfig(raw: unknown, source: string): HarnessConfig {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    console.warn(`Ignoring ${source}: expected a JSON object.`);
    return {};
  }

  const out: HarnessConfig = {};
  const tool: unknown = Reflect.get(raw, "tool");
  if (typeof tool === "string" && tool.trim()) {
    out.tool = tool.trim();
  }

  const collectors: unknown = Reflect.get(raw, "collectors");
  if (collectors !== undefined) {
    out.collectors = normalizeCollectorNames(collectors);
  }

  const outputFile: unknown = Reflect.get(raw, "outputFile");
  if (typeof outputFile === "string" && outputFile.trim()) {
    out.outputFile = outputFile.trim();
  }

  return out;
}
