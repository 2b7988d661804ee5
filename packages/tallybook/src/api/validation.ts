// =============================================================================
// API VALIDATION: Request shape checks shared by route handlers
// =============================================================================
// Only the JSON shape is checked here. Value rules (positive amounts, length
// limits) belong to the ledger and surface as INVALID_ARGUMENT from there.

import { LedgerError } from "@tallybook/core";
import type { ApiRequest } from "./handler.js";

export type FieldSpec = "string" | "number" | "string?" | "number?";

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check `body` against `fields` and return it as an object.
 * Throws INVALID_ARGUMENT naming the first offending field.
 */
export function readBody(body: unknown, fields: Record<string, FieldSpec>): JsonObject {
	if (!isJsonObject(body)) {
		throw LedgerError.invalidArgument("Request body must be a JSON object");
	}
	for (const [key, spec] of Object.entries(fields)) {
		const optional = spec.endsWith("?");
		const expectedType = optional ? spec.slice(0, -1) : spec;
		const value = body[key];
		if (value === undefined || value === null) {
			if (!optional) throw LedgerError.invalidArgument(`Missing required field: "${key}"`);
			continue;
		}
		if (typeof value !== expectedType) {
			throw LedgerError.invalidArgument(`Field "${key}" must be ${expectedType}, got ${typeof value}`);
		}
	}
	return body;
}

export function stringField(body: JsonObject, key: string): string {
	const value = body[key];
	return typeof value === "string" ? value : "";
}

export function optionalStringField(body: JsonObject, key: string): string | null {
	const value = body[key];
	return typeof value === "string" ? value : null;
}

export function numberField(body: JsonObject, key: string): number {
	const value = body[key];
	return typeof value === "number" ? value : Number.NaN;
}

/** Case-insensitive header lookup. */
export function header(req: ApiRequest, name: string): string | undefined {
	if (!req.headers) return undefined;
	const wanted = name.toLowerCase();
	for (const [key, value] of Object.entries(req.headers)) {
		if (key.toLowerCase() === wanted) return value;
	}
	return undefined;
}

export function parseLimit(raw: string | undefined): number | undefined {
	if (raw === undefined || raw === "") return undefined;
	if (!/^\d+$/.test(raw)) {
		throw LedgerError.invalidArgument("limit must be a positive integer");
	}
	return Number(raw);
}
