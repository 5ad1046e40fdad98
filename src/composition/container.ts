import '../features';
import { loadConfig } from '../config';
import { CONFIG_PATH, COLLECTOR_NAMES, DEBUG_MODE, OUTPUT_FILE, TOOL_NAME } from '../env';
import { TOOLS, COLLECTORS } from '../registry';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { ChildProcessRunner } from '../adapters/process/ChildProcessRunner';
import { BenchmarkDispatcher } from '../app/BenchmarkDispatcher';

export interface ApplicationInstance {
  dispatcher: BenchmarkDispatcher;
  /** Tool from --tool/BENCHMARK_TOOL, falling back to the config file. */
  toolName?: string;
  collectorNames: string[];
}

const DEFAULT_COLLECTORS = ['stdout'];

export function buildApplication(): ApplicationInstance {
  const { config: harnessConfig, path: configPath } = loadConfig(CONFIG_PATH);
  if (configPath) {
    console.log(`Loaded config from ${configPath}`);
  } else if (CONFIG_PATH) {
    console.warn(`Config file ${CONFIG_PATH} not found; proceeding with defaults.`);
  }

  const logger = new ConsoleLogger({ debug: DEBUG_MODE });
  const runner = new ChildProcessRunner(logger.child('process'));

  const toolName = TOOL_NAME ?? harnessConfig.tool;
  const collectorNames = COLLECTOR_NAMES.length
    ? COLLECTOR_NAMES
    : harnessConfig.collectors ?? DEFAULT_COLLECTORS;

  // The load phase is over once '../features' has been evaluated above.
  const dispatcher = new BenchmarkDispatcher(TOOLS, COLLECTORS, {
    benchmark: { runner, logger: logger.child(toolName ?? 'benchmark') },
    collector: {
      logger: logger.child('collector'),
      out: process.stdout,
      filePath: OUTPUT_FILE ?? harnessConfig.outputFile,
    },
    logger,
  });

  return { dispatcher, toolName, collectorNames };
}
