import fs from "fs";
import { ArgumentGroup, type ParsedArgs } from "./ArgumentGroup";
import type { MetricDocument } from "../collectors/Collector";
import type {
  ProcessRunnerPort,
  ProcessSample,
  RunProcessOptions,
} from "../../ports/process/ProcessRunnerPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";

export interface BenchmarkDeps {
  runner: ProcessRunnerPort;
  logger: LoggerPort;
}

export interface BenchmarkRunResult {
  ok: boolean;
  /** Raw stdout of every successful sample, in run order. */
  samples: string[];
}

/**
 * Base class for tool plugins. A concrete benchmark declares
 * `static readonly toolName`, carries `@registerTool`, adds its arguments
 * to `argGroup` in its constructor and implements the lifecycle hooks the
 * dispatcher drives: preflight, setup, run, cleanup, emitMetrics.
 */
export abstract class Benchmark {
  readonly argGroup: ArgumentGroup;
  readonly requiredArgs = new Set<string>();
  config: ParsedArgs = {};

  protected readonly runner: ProcessRunnerPort;
  protected readonly logger: LoggerPort;

  constructor(deps: BenchmarkDeps) {
    this.runner = deps.runner;
    this.logger = deps.logger;
    this.argGroup = new ArgumentGroup(`${this.toolName} arguments`);
  }

  get toolName(): string {
    const value: unknown = Reflect.get(this.constructor, "toolName");
    return typeof value === "string" ? value : this.constructor.name;
  }

  /** Fills `config` and returns the tokens no argument claimed. */
  parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): string[] {
    const { values, rest } = this.argGroup.parse(argv, env);
    this.config = values;
    return rest;
  }

  checkRequiredArgs(): boolean {
    const missing = Array.from(this.requiredArgs).filter((dest) => {
      const value = this.config[dest];
      return value === undefined || value === "";
    });
    for (const dest of missing) {
      this.logger.error(`Missing required argument "${dest}"`);
    }
    return missing.length === 0;
  }

  checkFile(filePath: string | undefined): boolean {
    if (!filePath) {
      this.logger.error("No file path given");
      return false;
    }
    try {
      if (fs.statSync(filePath).isFile()) return true;
      this.logger.error(`Not a file: ${filePath}`);
    } catch {
      this.logger.error(`File not found: ${filePath}`);
    }
    return false;
  }

  runProcess(command: string, args: string[], options?: RunProcessOptions): Promise<ProcessSample> {
    return this.runner.run(command, args, options);
  }

  abstract preflightChecks(): boolean;
  abstract setup(): Promise<void>;
  abstract run(): Promise<BenchmarkRunResult>;
  abstract cleanup(): Promise<void>;
  abstract emitMetrics(samples: string[]): MetricDocument[];
}

export type BenchmarkClass = new (deps: BenchmarkDeps) => Benchmark;
