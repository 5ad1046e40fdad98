import { config } from 'dotenv';
import { normalizeCollectorNames } from './config';

config();

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export let TOOL_NAME = process.env.BENCHMARK_TOOL || undefined;
export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';
export let OUTPUT_FILE = process.env.COLLECTOR_OUTPUT_FILE || undefined;

const envCollectors = splitList(process.env.BENCHMARK_COLLECTORS);
const cliCollectors: string[] = [];
const toolArgs: string[] = [];

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;
let logFileArg: string | undefined;
let listRequested = false;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--tool':
      if (cliArgs[i + 1]) {
        TOOL_NAME = cliArgs[++i];
      }
      break;
    case '--collector':
      if (cliArgs[i + 1]) {
        cliCollectors.push(...splitList(cliArgs[++i]));
      }
      break;
    case '--output-file':
      if (cliArgs[i + 1]) {
        OUTPUT_FILE = cliArgs[++i];
      }
      break;
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--list':
      listRequested = true;
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    default:
      // Everything else belongs to the selected tool.
      toolArgs.push(arg);
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const LOG_FILE = logFileArg;
export const LIST_PLUGINS = listRequested;
export const COLLECTOR_NAMES = normalizeCollectorNames(cliCollectors.length ? cliCollectors : envCollectors);
export const TOOL_ARGS = toolArgs;
