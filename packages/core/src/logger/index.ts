export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { isLogLevel, LEVEL_PRIORITY, silentLogger } from "./levels.js";
export { buildRedactKeys, redactData } from "./redact.js";
