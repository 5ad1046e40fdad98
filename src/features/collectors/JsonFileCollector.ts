import { promises as fs } from "fs";
import path from "path";
import { Collector, type MetricDocument } from "../../domain/collectors/Collector";
import { registerCollector } from "../../registry";

@registerCollector
export class JsonFileCollector extends Collector {
  static readonly collectorName = "json_file";

  async emit(documents: MetricDocument[]): Promise<void> {
    const { filePath, logger } = this.deps;
    if (!filePath) {
      throw new Error(
        "json_file collector needs an output path (--output-file, COLLECTOR_OUTPUT_FILE or config.outputFile)."
      );
    }

    const resolved = path.resolve(filePath);
    await fs.mkdir(path.dirname(resolved), { recursive: true });
    const body = documents.map((doc) => `${JSON.stringify(doc)}\n`).join("");
    await fs.appendFile(resolved, body, "utf8");
    logger.info(`Appended ${documents.length} documents to ${resolved}`);
  }
}
