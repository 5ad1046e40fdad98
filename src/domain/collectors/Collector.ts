import type { LoggerPort } from "../../ports/sys/LoggerPort";

export type MetricValue = string | number | boolean | null;
export type MetricDocument = Record<string, MetricValue>;

export interface CollectorDeps {
  logger: LoggerPort;
  out: { write(chunk: string): unknown };
  /** Destination for collectors that write to disk. */
  filePath?: string;
}

/**
 * Base class for metric emitters. Concrete collectors declare
 * `static readonly collectorName` and carry `@registerCollector`.
 */
export abstract class Collector {
  constructor(protected readonly deps: CollectorDeps) {}

  abstract emit(documents: MetricDocument[]): Promise<void>;
}

export type CollectorClass = new (deps: CollectorDeps) => Collector;
