// =============================================================================
// SCHEMA PREFIX: Qualifies table names with the configured PostgreSQL schema.
// =============================================================================

/**
 * Creates a function that qualifies table names with the configured PostgreSQL schema.
 *
 * - `"public"` → `"table_name"`
 * - `"ledger"` → `"ledger"."table_name"`
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	if (schema === "public") {
		return (tableName: string) => `"${tableName}"`;
	}
	return (tableName: string) => `"${schema}"."${tableName}"`;
}

/** PostgreSQL identifiers accepted for the schema option. */
export function isValidSchemaName(schema: string): boolean {
	return /^[a-z_][a-z0-9_]{0,62}$/.test(schema);
}
