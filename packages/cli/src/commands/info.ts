import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { type LedgerEnvConfig, loadEnvConfig, maskDatabaseUrl } from "../utils/env-config.js";

// =============================================================================
// INFO COMMAND
// =============================================================================

export function describeConfig(config: LedgerEnvConfig, version: string) {
	return {
		node: process.version,
		tallybook: {
			version,
			appName: config.appName,
			storage: config.databaseUrl ? "postgres" : "memory",
			databaseUrl: config.databaseUrl ? maskDatabaseUrl(config.databaseUrl) : null,
			schema: config.schema,
			port: config.port,
			logLevel: config.logLevel,
			logFormat: config.logFormat,
			cursorSecret: config.cursorSecret ? "[REDACTED]" : null,
		},
	};
}

export const infoCommand = new Command("info")
	.description("Show the resolved configuration")
	.option("--json", "Output as JSON")
	.action((options: { json?: boolean }) => {
		const version: string = infoCommand.parent?.version() ?? "unknown";
		const info = describeConfig(loadEnvConfig(), version);

		if (options.json) {
			process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" tallybook info ")));
		const t = info.tallybook;
		const lines = [
			`${pc.bold("Version:")}        v${t.version}`,
			`${pc.bold("Node:")}           ${info.node}`,
			`${pc.bold("App name:")}       ${t.appName}`,
			`${pc.bold("Storage:")}        ${t.storage}`,
			`${pc.bold("Database URL:")}  ${t.databaseUrl ?? pc.dim("not set")}`,
			`${pc.bold("Schema:")}         ${t.schema}`,
			`${pc.bold("Port:")}           ${t.port}`,
			`${pc.bold("Logging:")}        ${t.logLevel} (${t.logFormat})`,
			`${pc.bold("Cursor secret:")}  ${t.cursorSecret ?? pc.yellow("not set (per-process)")}`,
		];
		p.note(lines.join("\n"), "Tallybook");
		p.outro(pc.dim("Run with --json for machine-readable output"));
	});
