import { describe, expect, it } from "vitest";
import { describeConfig } from "../commands/info.js";
import {
	loadEnvConfig,
	maskDatabaseUrl,
	parsePort,
	sanitizeErrorMessage,
} from "../utils/env-config.js";

describe("loadEnvConfig", () => {
	it("falls back to defaults for an empty environment", () => {
		expect(loadEnvConfig({})).toEqual({
			appName: "Tallybook",
			databaseUrl: null,
			logLevel: "info",
			logFormat: "pretty",
			port: 3000,
			schema: "tallybook",
			cursorSecret: null,
		});
	});

	it("reads every LEDGER_ variable", () => {
		const config = loadEnvConfig({
			LEDGER_APP_NAME: "Ledger API",
			LEDGER_DATABASE_URL: "postgres://ledger:pw@db:5432/ledger",
			LEDGER_LOG_LEVEL: "debug",
			LEDGER_LOG_FORMAT: "json",
			LEDGER_PORT: "8080",
			LEDGER_SCHEMA: "books",
			LEDGER_CURSOR_SECRET: "test-secret",
		});
		expect(config).toEqual({
			appName: "Ledger API",
			databaseUrl: "postgres://ledger:pw@db:5432/ledger",
			logLevel: "debug",
			logFormat: "json",
			port: 8080,
			schema: "books",
			cursorSecret: "test-secret",
		});
	});

	it("treats blank values as unset", () => {
		const config = loadEnvConfig({ LEDGER_DATABASE_URL: "   ", LEDGER_PORT: "" });
		expect(config.databaseUrl).toBeNull();
		expect(config.port).toBe(3000);
	});

	it("rejects an unknown log level", () => {
		expect(() => loadEnvConfig({ LEDGER_LOG_LEVEL: "verbose" })).toThrow(
			'LEDGER_LOG_LEVEL must be one of debug, info, warn, error (got "verbose")',
		);
	});

	it("rejects an unknown log format", () => {
		expect(() => loadEnvConfig({ LEDGER_LOG_FORMAT: "xml" })).toThrow(
			'LEDGER_LOG_FORMAT must be "pretty" or "json" (got "xml")',
		);
	});

	it("rejects a schema that is not an identifier", () => {
		expect(() => loadEnvConfig({ LEDGER_SCHEMA: "Bad-Schema" })).toThrow(
			'LEDGER_SCHEMA must be a lowercase identifier (got "Bad-Schema")',
		);
	});
});

describe("parsePort", () => {
	it("accepts ports in range", () => {
		expect(parsePort("1")).toBe(1);
		expect(parsePort("65535")).toBe(65535);
	});

	it("rejects zero, out-of-range and non-numeric values", () => {
		expect(() => parsePort("0", "LEDGER_PORT")).toThrow(
			'LEDGER_PORT must be an integer between 1 and 65535 (got "0")',
		);
		expect(() => parsePort("70000")).toThrow("port must be an integer between 1 and 65535");
		expect(() => parsePort("80a")).toThrow('(got "80a")');
	});
});

describe("maskDatabaseUrl", () => {
	it("hides the password and keeps the rest", () => {
		expect(maskDatabaseUrl("postgres://ledger:pw@db:5432/ledger")).toBe(
			"postgres://ledger:***@db:5432/ledger",
		);
	});

	it("leaves URLs without a password alone", () => {
		expect(maskDatabaseUrl("postgres://db:5432/ledger")).toBe("postgres://db:5432/ledger");
	});

	it("masks everything when the URL does not parse", () => {
		expect(maskDatabaseUrl("not a url")).toBe("***");
	});
});

describe("sanitizeErrorMessage", () => {
	it("strips connection strings and secrets", () => {
		expect(
			sanitizeErrorMessage("connect to postgres://u:p@h/db failed, password=hunter"),
		).toBe("connect to postgres://*** failed, password=***");
	});
});

describe("describeConfig", () => {
	it("masks the database URL and redacts the cursor secret", () => {
		const info = describeConfig(
			loadEnvConfig({
				LEDGER_DATABASE_URL: "postgres://ledger:pw@db/ledger",
				LEDGER_CURSOR_SECRET: "test-secret",
			}),
			"1.2.3",
		);
		expect(info.tallybook).toEqual({
			version: "1.2.3",
			appName: "Tallybook",
			storage: "postgres",
			databaseUrl: "postgres://ledger:***@db/ledger",
			schema: "tallybook",
			port: 3000,
			logLevel: "info",
			logFormat: "pretty",
			cursorSecret: "[REDACTED]",
		});
	});
});
