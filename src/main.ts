#!/usr/bin/env node
import { LIST_PLUGINS, LOG_FILE, TOOL_ARGS } from './env';
import { initializeLogging } from './runtime/logging';
import { buildApplication } from './composition/container';

async function main(): Promise<number> {
  const { dispatcher, toolName, collectorNames } = buildApplication();

  if (LIST_PLUGINS) {
    console.log(`Tools: ${dispatcher.listTools().join(', ') || '(none)'}`);
    console.log(`Collectors: ${dispatcher.listCollectors().join(', ') || '(none)'}`);
    if (toolName) {
      const help = dispatcher.describeTool(toolName);
      if (help) console.log(help);
    }
    return 0;
  }

  if (!toolName) {
    console.error('No tool selected. Pass --tool <name> or set BENCHMARK_TOOL (see --list).');
    return 2;
  }

  const result = await dispatcher.dispatch({
    tool: toolName,
    collectors: collectorNames,
    argv: TOOL_ARGS,
    env: process.env,
  });

  if (result.ok) {
    console.info(result.message);
    return 0;
  }
  console.error(result.message);
  return 1;
}

const loggingHandle = initializeLogging(LOG_FILE);
if (loggingHandle.logPath) {
  console.log(`Logging output to ${loggingHandle.logPath}`);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Benchmark harness crashed:', err);
    process.exitCode = 1;
  })
  .finally(() => loggingHandle.shutdown());
