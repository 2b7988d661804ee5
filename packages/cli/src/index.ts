#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import pc from "picocolors";
import { infoCommand } from "./commands/info.js";
import { migrateCommand } from "./commands/migrate.js";
import { serveCommand } from "./commands/serve.js";
import { sanitizeErrorMessage } from "./utils/env-config.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../package.json"), "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch {
		// Fallback version
	}
	return "0.1.0";
}

const cliVersion = readVersion();

const BANNER = `
  ${pc.bold(pc.cyan("tallybook"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Transactional ledger with idempotent transfers")}
`;

const program = new Command()
	.name("tallybook")
	.description("Command line tools for the tallybook ledger service")
	.version(cliVersion, "-v, --version")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(migrateCommand);
program.addCommand(serveCommand);
program.addCommand(infoCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(sanitizeErrorMessage(message)));
	process.exit(1);
}
