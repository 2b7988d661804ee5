import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import pg from "pg";
import { CORE_TABLES, generateMigrationSql } from "tallybook";
import { loadEnvConfig, maskDatabaseUrl } from "../utils/env-config.js";

// =============================================================================
// MIGRATE COMMAND
// =============================================================================
// Every statement is IF NOT EXISTS / CREATE OR REPLACE, so running the
// migration again against an up-to-date database changes nothing.

export const migrateCommand = new Command("migrate")
	.description("Create the ledger schema, tables and indexes")
	.option("--url <url>", "PostgreSQL connection URL (or set LEDGER_DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema (or set LEDGER_SCHEMA)")
	.option("--dry-run", "Print the SQL instead of running it")
	.option("-y, --yes", "Skip confirmation prompt")
	.action(async (options: { url?: string; schema?: string; dryRun?: boolean; yes?: boolean }) => {
		const config = loadEnvConfig();
		const schema = options.schema ?? config.schema;
		const sql = generateMigrationSql(schema);

		if (options.dryRun) {
			process.stdout.write(sql);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" tallybook migrate ")));

		const dbUrl = options.url ?? config.databaseUrl;
		if (!dbUrl) {
			p.log.error(`${pc.red("No database URL.")} Pass --url or set LEDGER_DATABASE_URL.`);
			process.exitCode = 1;
			return;
		}

		p.log.info(`Database: ${pc.cyan(maskDatabaseUrl(dbUrl))}`);
		p.log.info(
			`Schema ${pc.cyan(schema)}: ${Object.keys(CORE_TABLES)
				.map((t) => pc.cyan(t))
				.join(", ")}`,
		);

		if (!options.yes) {
			const confirmed = await p.confirm({
				message: "Apply the schema to this database?",
				initialValue: false,
			});
			if (p.isCancel(confirmed) || !confirmed) {
				p.cancel("Migration cancelled.");
				return;
			}
		}

		const client = new pg.Client({ connectionString: dbUrl });
		const s = p.spinner();
		try {
			await client.connect();
			s.start("Applying schema...");

			// PostgreSQL DDL is transactional; a failure leaves nothing behind
			await client.query("BEGIN");
			try {
				await client.query(sql);
				await client.query("COMMIT");
			} catch (error) {
				await client.query("ROLLBACK");
				throw error;
			}

			s.stop("Schema applied");
			p.outro(pc.green("Database is ready."));
		} finally {
			await client.end();
		}
	});
