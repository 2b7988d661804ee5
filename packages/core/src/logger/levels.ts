import type { LogLevel } from "../types/config.js";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_PRIORITY, value);
}

/** Logger that drops everything. Used by tests and embedded callers. */
export const silentLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
