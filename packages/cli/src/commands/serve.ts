import { Command } from "commander";
import express, { type NextFunction, type Request, type Response } from "express";
import pc from "picocolors";
import { createTallybookExpress } from "tallybook";
import { loadEnvConfig, maskDatabaseUrl, parsePort } from "../utils/env-config.js";
import { createRuntime } from "../utils/runtime.js";

// =============================================================================
// SERVE COMMAND
// =============================================================================

function isBodyParseError(error: unknown): boolean {
	return (
		error instanceof SyntaxError &&
		"type" in error &&
		error.type === "entity.parse.failed"
	);
}

export const serveCommand = new Command("serve")
	.description("Run the ledger HTTP API")
	.option("-p, --port <port>", "Port to listen on (or set LEDGER_PORT)")
	.action(async (options: { port?: string }) => {
		const config = loadEnvConfig();
		const port = options.port ? parsePort(options.port, "--port") : config.port;
		const runtime = createRuntime(config);
		const { logger } = runtime;

		// Fail fast on bad options before opening the port
		await runtime.tallybook.$context;

		const app = express();
		app.disable("x-powered-by");
		app.use(express.json({ limit: "64kb" }));
		app.use(createTallybookExpress(runtime.tallybook, { appName: config.appName }));
		app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
			if (isBodyParseError(error)) {
				res.status(400).json({
					error: { code: "INVALID_ARGUMENT", message: "Request body is not valid JSON" },
				});
				return;
			}
			logger.error("http.unhandled", {
				error: error instanceof Error ? error.message : String(error),
			});
			if (res.headersSent) {
				next(error);
				return;
			}
			res.status(500).json({ error: { code: "INTERNAL", message: "Internal server error" } });
		});

		const server = app.listen(port, () => {
			logger.info("server.listening", {
				port,
				storage: config.databaseUrl ? maskDatabaseUrl(config.databaseUrl) : "memory",
			});
			console.log(`  ${pc.bold(pc.cyan(config.appName))} listening on ${pc.cyan(`http://localhost:${port}`)}`);
		});

		let stopping = false;
		const shutdown = (signal: string) => {
			if (stopping) return;
			stopping = true;
			logger.info("server.stopping", { signal });
			server.close((error) => {
				if (error) logger.error("server.close_failed", { error: error.message });
				runtime
					.close()
					.catch((closeError: unknown) => {
						logger.error("storage.close_failed", {
							error: closeError instanceof Error ? closeError.message : String(closeError),
						});
						process.exitCode = 1;
					})
					.finally(() => {
						logger.info("server.stopped");
					});
			});
		};

		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));
	});
