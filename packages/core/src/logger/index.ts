export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export type { LogLevel } from "./levels.js";
export { noopLogger } from "./noop-logger.js";
export { buildRedactKeys, redactData } from "./redact.js";
