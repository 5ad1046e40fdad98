import { Collector, type MetricDocument } from "../../domain/collectors/Collector";
import { registerCollector } from "../../registry";

/** Writes each document as one JSON line. */
@registerCollector
export class StdoutCollector extends Collector {
  static readonly collectorName = "stdout";

  async emit(documents: MetricDocument[]): Promise<void> {
    for (const doc of documents) {
      this.deps.out.write(`${JSON.stringify(doc)}\n`);
    }
    this.deps.logger.debug(`Wrote ${documents.length} documents to stdout`);
  }
}
