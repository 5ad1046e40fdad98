import type { BenchmarkClass, BenchmarkDeps } from "../domain/benchmark/Benchmark";
import { ArgumentError } from "../domain/benchmark/ArgumentGroup";
import type { CollectorClass, CollectorDeps, MetricDocument } from "../domain/collectors/Collector";
import type { NamedTypeRegistry } from "../registry/NamedTypeRegistry";
import type { LoggerPort } from "../ports/sys/LoggerPort";

export interface DispatchRequest {
  tool: string;
  collectors: string[];
  argv: string[];
  env?: NodeJS.ProcessEnv;
}

export interface DispatchSummary {
  tool: string;
  samples: number;
  documents: number;
}

export interface DispatchResult {
  ok: boolean;
  message: string;
  data?: DispatchSummary;
}

export interface DispatcherDeps {
  benchmark: BenchmarkDeps;
  collector: CollectorDeps;
  logger: LoggerPort;
}

function describeList(names: string[]): string {
  return names.length ? names.join(", ") : "(none)";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolves tool and collector names against the registries it is given and
 * drives one benchmark through preflight, setup, run, cleanup and emission.
 */
export class BenchmarkDispatcher {
  constructor(
    private readonly tools: NamedTypeRegistry<BenchmarkClass>,
    private readonly collectors: NamedTypeRegistry<CollectorClass>,
    private readonly deps: DispatcherDeps
  ) {}

  listTools(): string[] {
    return this.tools.names();
  }

  listCollectors(): string[] {
    return this.collectors.names();
  }

  describeTool(name: string): string | undefined {
    const ToolType = this.tools.lookup(name);
    if (!ToolType) return undefined;
    return new ToolType(this.deps.benchmark).argGroup.helpText();
  }

  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const { logger } = this.deps;

    const ToolType = this.tools.lookup(request.tool);
    if (!ToolType) {
      return {
        ok: false,
        message: `Unknown tool "${request.tool}". Registered tools: ${describeList(this.listTools())}.`,
      };
    }

    const collectorTypes: Array<{ name: string; type: CollectorClass }> = [];
    for (const name of request.collectors) {
      const CollectorType = this.collectors.lookup(name);
      if (!CollectorType) {
        return {
          ok: false,
          message: `Unknown collector "${name}". Registered collectors: ${describeList(this.listCollectors())}.`,
        };
      }
      collectorTypes.push({ name, type: CollectorType });
    }

    const tool = new ToolType(this.deps.benchmark);
    try {
      const rest = tool.parseArgs(request.argv, request.env ?? process.env);
      if (rest.length) {
        logger.warn(`Ignoring arguments ${tool.toolName} does not accept`, { args: rest });
      }
    } catch (err) {
      if (err instanceof ArgumentError) {
        return { ok: false, message: err.message };
      }
      throw err;
    }

    if (!tool.preflightChecks()) {
      return { ok: false, message: `Preflight checks failed for ${tool.toolName}.` };
    }

    let samples: string[];
    await tool.setup();
    try {
      const result = await tool.run();
      if (!result.ok) {
        return {
          ok: false,
          message: `${tool.toolName} failed after ${result.samples.length} successful samples.`,
        };
      }
      samples = result.samples;
    } finally {
      await tool.cleanup();
    }

    let documents: MetricDocument[];
    try {
      documents = tool.emitMetrics(samples);
    } catch (err) {
      return { ok: false, message: `Could not parse ${tool.toolName} output: ${errorMessage(err)}` };
    }

    for (const { name, type: CollectorType } of collectorTypes) {
      const collector = new CollectorType(this.deps.collector);
      try {
        await collector.emit(documents);
      } catch (err) {
        logger.error(`Collector ${name} failed`, { error: errorMessage(err) });
        return { ok: false, message: `Collector ${name} failed: ${errorMessage(err)}` };
      }
    }

    return {
      ok: true,
      message: `${tool.toolName} finished: ${samples.length} samples, ${documents.length} documents.`,
      data: { tool: tool.toolName, samples: samples.length, documents: documents.length },
    };
  }
}
