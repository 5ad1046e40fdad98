export {
  TOOLS,
  COLLECTORS,
  registerTool,
  registerCollector,
  NamedTypeRegistry,
  RegistryError,
  MissingNameError,
  DuplicateNameError,
} from "./registry";
export type { ClassRegistrar, RegistrableType } from "./registry/NamedTypeRegistry";
export { Benchmark } from "./domain/benchmark/Benchmark";
export type { BenchmarkClass, BenchmarkDeps, BenchmarkRunResult } from "./domain/benchmark/Benchmark";
export { ArgumentGroup, ArgumentError } from "./domain/benchmark/ArgumentGroup";
export type { ArgumentOptions, ArgumentSpec, ArgumentType, ParsedArgs } from "./domain/benchmark/ArgumentGroup";
export { Collector } from "./domain/collectors/Collector";
export type { CollectorClass, CollectorDeps, MetricDocument, MetricValue } from "./domain/collectors/Collector";
export { BenchmarkDispatcher } from "./app/BenchmarkDispatcher";
export type { DispatchRequest, DispatchResult, DispatchSummary } from "./app/BenchmarkDispatcher";
export { Uperf, UperfParseError, StdoutCollector, JsonFileCollector } from "./features";
export { ChildProcessRunner } from "./adapters/process/ChildProcessRunner";
export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export type { LoggerPort } from "./ports/sys/LoggerPort";
export type { ProcessRunnerPort, ProcessSample, RunProcessOptions } from "./ports/process/ProcessRunnerPort";
