// =============================================================================
// DDL GENERATION
// =============================================================================
// Idempotent PostgreSQL DDL for CORE_TABLES. Safe to run on every deploy.

import { createTableResolver } from "@tallybook/core";
import { type ColumnDefinition, CORE_TABLES, type TableDefinition } from "./schema.js";

function pgType(col: ColumnDefinition): string {
	switch (col.type) {
		case "text":
			return "TEXT";
		case "bigint":
			return "BIGINT";
		case "integer":
			return "INTEGER";
		case "timestamp":
			return "TIMESTAMPTZ";
	}
}

function columnSQL(name: string, col: ColumnDefinition, t: (table: string) => string): string {
	const parts = [name, pgType(col)];
	if (col.primaryKey) parts.push("PRIMARY KEY");
	if (col.notNull && !col.primaryKey) parts.push("NOT NULL");
	if (col.default) parts.push(`DEFAULT ${col.default}`);
	if (col.check) parts.push(`CHECK (${col.check})`);
	if (col.references) {
		parts.push(`REFERENCES ${t(col.references.table)}(${col.references.column})`);
	}
	return `  ${parts.join(" ")}`;
}

function createTableSQL(
	tableName: string,
	def: TableDefinition,
	t: (table: string) => string,
): string {
	const lines = Object.entries(def.columns).map(([name, col]) => columnSQL(name, col, t));
	if (def.primaryKey) {
		lines.push(`  PRIMARY KEY (${def.primaryKey.join(", ")})`);
	}

	let sql = `CREATE TABLE IF NOT EXISTS ${t(tableName)} (\n${lines.join(",\n")}\n);\n`;
	// Index names live in the table's schema, so they are never qualified
	for (const idx of def.indexes ?? []) {
		const kind = idx.unique ? "UNIQUE INDEX" : "INDEX";
		sql += `CREATE ${kind} IF NOT EXISTS ${idx.name} ON ${t(tableName)} (${idx.columns.join(", ")});\n`;
	}
	return sql;
}

function immutableTriggerSQL(tableName: string, schema: string, t: (table: string) => string): string {
	const fn = schema === "public" ? "prevent_update_delete" : `"${schema}".prevent_update_delete`;
	const trigger = `trg_immutable_${tableName}`;
	return `DROP TRIGGER IF EXISTS ${trigger} ON ${t(tableName)};
CREATE TRIGGER ${trigger}
  BEFORE UPDATE OR DELETE ON ${t(tableName)}
  FOR EACH ROW
  EXECUTE FUNCTION ${fn}();
`;
}

function preventMutationFunctionSQL(schema: string): string {
	const fn = schema === "public" ? "prevent_update_delete" : `"${schema}".prevent_update_delete`;
	return `CREATE OR REPLACE FUNCTION ${fn}()
RETURNS TRIGGER AS $$
BEGIN
  RAISE EXCEPTION 'Table %.% is append-only', TG_TABLE_SCHEMA, TG_TABLE_NAME;
END;
$$ LANGUAGE plpgsql;
`;
}

/**
 * Generate the full DDL for the ledger tables in `schema`.
 *
 * @example
 * ```ts
 * await pool.query(generateMigrationSql("tallybook"));
 * ```
 */
export function generateMigrationSql(
	schema: string,
	tables: Record<string, TableDefinition> = CORE_TABLES,
): string {
	const t = createTableResolver(schema);
	const parts: string[] = [];

	if (schema !== "public") {
		parts.push(`CREATE SCHEMA IF NOT EXISTS "${schema}";\n`);
	}
	for (const [name, def] of Object.entries(tables)) {
		parts.push(createTableSQL(name, def, t));
	}

	const immutable = Object.entries(tables).filter(([, def]) => def.immutable);
	if (immutable.length > 0) {
		parts.push(preventMutationFunctionSQL(schema));
		for (const [name] of immutable) {
			parts.push(immutableTriggerSQL(name, schema, t));
		}
	}

	return parts.join("\n");
}
