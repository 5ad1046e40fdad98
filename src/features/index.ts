// Importing this module is the load phase: each plugin registers itself
// as its class is defined.
export { Uperf, UperfParseError } from "./benchmarks/Uperf";
export { StdoutCollector } from "./collectors/StdoutCollector";
export { JsonFileCollector } from "./collectors/JsonFileCollector";
