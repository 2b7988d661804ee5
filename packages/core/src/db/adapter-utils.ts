// =============================================================================
// SHARED ADAPTER UTILITIES
// =============================================================================
// camelCase ↔ snake_case conversion and WHERE clause building for SQL adapters.

import type { SortBy, Where } from "./adapter.js";

export function toSnakeCase(str: string): string {
	return str.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

export function toCamelCase(str: string): string {
	return str.replace(/_([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

export function keysToSnake(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toSnakeCase(key)] = value;
	}
	return result;
}

export function keysToCamel(obj: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[toCamelCase(key)] = value;
	}
	return result;
}

/** Normalize the `sortBy` argument to a list. */
export function toSortList(sortBy: SortBy | SortBy[] | undefined): SortBy[] {
	if (!sortBy) return [];
	return Array.isArray(sortBy) ? sortBy : [sortBy];
}

/** Values of an `in` condition. A scalar is treated as a one-element list. */
export function inValues(value: unknown): unknown[] {
	return Array.isArray(value) ? value : [value];
}

/**
 * Build a SQL WHERE clause from an array of Where conditions.
 * Returns the clause string (without the WHERE keyword) and parameter values.
 * Parameter numbering starts at startIndex (`$1`, `$2`, ...).
 */
export function buildWhereClause(
	where: Where[],
	startIndex: number = 1,
): { clause: string; params: unknown[] } {
	if (where.length === 0) {
		return { clause: "TRUE", params: [] };
	}

	const conditions: string[] = [];
	const params: unknown[] = [];
	let paramIdx = startIndex;

	const compare = (col: string, op: string, value: unknown) => {
		conditions.push(`"${col}" ${op} $${paramIdx}`);
		params.push(value);
		paramIdx++;
	};

	for (const w of where) {
		const col = toSnakeCase(w.field);

		switch (w.operator) {
			case "eq":
				compare(col, "=", w.value);
				break;
			case "ne":
				compare(col, "!=", w.value);
				break;
			case "gt":
				compare(col, ">", w.value);
				break;
			case "gte":
				compare(col, ">=", w.value);
				break;
			case "lt":
				compare(col, "<", w.value);
				break;
			case "lte":
				compare(col, "<=", w.value);
				break;
			case "in": {
				const values = inValues(w.value);
				if (values.length === 0) {
					conditions.push("FALSE");
					break;
				}
				const placeholders = values.map((_, i) => `$${paramIdx + i}`).join(", ");
				conditions.push(`"${col}" IN (${placeholders})`);
				params.push(...values);
				paramIdx += values.length;
				break;
			}
			case "is_null":
				conditions.push(`"${col}" IS NULL`);
				break;
			case "is_not_null":
				conditions.push(`"${col}" IS NOT NULL`);
				break;
		}
	}

	return { clause: conditions.join(" AND "), params };
}
