// =============================================================================
// JSON LOGGER: One JSON object per line for log aggregation
// =============================================================================

import type { LogLevel, TallybookLogger } from "../types/config.js";
import { LEVEL_PRIORITY } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"tallybook"` */
	service?: string;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". Default: common PII keys */
	redactKeys?: string[];
	/** Line sink. Default: `console.log` / `console.warn` / `console.error` by level */
	write?: (line: string, level: LogLevel) => void;
}

function writeToConsole(line: string, level: LogLevel): void {
	if (level === "error") console.error(line);
	else if (level === "warn") console.warn(line);
	else console.log(line);
}

/**
 * Create a structured JSON logger implementing `TallybookLogger`.
 *
 * @example
 * ```ts
 * const logger = createJsonLogger({ level: "debug", service: "ledger-api" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): TallybookLogger {
	const { level = "info", service = "tallybook", write = writeToConsole } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = redactData(data, redactKeys);
		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...safeData,
		};

		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
