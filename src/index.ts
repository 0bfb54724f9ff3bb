export { buildProgram } from "./cli/program.js";
export { createConfigIO, type ConfigIO } from "./config/io.js";
export { resolveStatePaths, type StatePaths } from "./config/paths.js";
export { createLogger, type Logger, type LogLevel } from "./logging/logger.js";
export { defaultRuntime, type RuntimeEnv } from "./runtime.js";
export { VERSION } from "./version.js";
export * from "../extensions/cost-monitor/src/index.js";
