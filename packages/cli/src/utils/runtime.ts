// =============================================================================
// Runtime: Builds a ledger instance from environment config
// =============================================================================

import type { LedgerAdapter, TallybookLogger } from "@tallybook/core";
import { createConsoleLogger, createJsonLogger } from "@tallybook/core";
import { createPooledAdapter, RECOMMENDED_POOL_CONFIG } from "@tallybook/kysely-adapter";
import { memoryAdapter } from "@tallybook/memory-adapter";
import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import { createTallybook, type Tallybook } from "tallybook";
import type { LedgerEnvConfig } from "./env-config.js";

export interface LedgerRuntime {
	tallybook: Tallybook;
	logger: TallybookLogger;
	/** Release the database pool, if any. */
	close: () => Promise<void>;
}

export function createLogger(config: LedgerEnvConfig): TallybookLogger {
	if (config.logFormat === "json") {
		return createJsonLogger({ level: config.logLevel, service: config.appName.toLowerCase() });
	}
	return createConsoleLogger({ level: config.logLevel, prefix: config.appName });
}

export function createRuntime(config: LedgerEnvConfig): LedgerRuntime {
	const logger = createLogger(config);

	let adapter: LedgerAdapter;
	let close = async () => {};
	if (config.databaseUrl) {
		const pool = new pg.Pool({ ...RECOMMENDED_POOL_CONFIG, connectionString: config.databaseUrl });
		const db = new Kysely<Record<string, never>>({ dialect: new PostgresDialect({ pool }) });
		const pooled = createPooledAdapter({ pool, db });
		adapter = pooled.adapter;
		close = pooled.close;
	} else {
		logger.warn("LEDGER_DATABASE_URL is not set. Using the in-memory store; data is lost on exit.");
		adapter = memoryAdapter();
	}

	const tallybook = createTallybook({
		database: adapter,
		logger,
		schema: config.schema,
		advanced: config.cursorSecret ? { cursorSecret: config.cursorSecret } : undefined,
	});

	return { tallybook, logger, close };
}
