// Storage
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, LedgerErrorCode, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, createErrorCodes, LedgerError } from "./error/index.js";

// Logging
export * from "./logger/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
