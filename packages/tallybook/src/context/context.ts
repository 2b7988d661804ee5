// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds TallybookContext from TallybookOptions. Resolves adapter, logger,
// clock and id source, merges config defaults.

import { randomBytes } from "node:crypto";
import type {
	LedgerAdapter,
	ResolvedAdvancedOptions,
	ResolvedTallybookOptions,
	TallybookContext,
	TallybookOptions,
} from "@tallybook/core";
import { createConsoleLogger, createMonotonicClock, generateId } from "@tallybook/core";
import { validateConfig } from "../config/index.js";

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

const DEFAULT_ADVANCED: Omit<ResolvedAdvancedOptions, "cursorSecret"> = {
	idempotencyTTL: 24 * 60 * 60 * 1000, // 24 hours in ms
	reservationTimeoutMs: 30_000,
	lockTimeoutMs: 3000,
	maxTransactionAmount: 100_000_000_000,
	statementDefaultLimit: 50,
	statementMaxLimit: 200,
};

// Shared by every ledger in this process that has no configured secret, so
// cursors stay valid across instances built from the same options.
let processCursorSecret: string | undefined;

function fallbackCursorSecret(): string {
	processCursorSecret ??= randomBytes(32).toString("hex");
	return processCursorSecret;
}

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export async function buildContext(options: TallybookOptions): Promise<TallybookContext> {
	validateConfig(options);

	const adapter: LedgerAdapter =
		typeof options.database === "function" ? options.database() : options.database;

	const logger = options.logger ?? createConsoleLogger();

	const adv = options.advanced ?? {};
	const advanced: ResolvedAdvancedOptions = {
		idempotencyTTL: adv.idempotencyTTL ?? DEFAULT_ADVANCED.idempotencyTTL,
		reservationTimeoutMs: adv.reservationTimeoutMs ?? DEFAULT_ADVANCED.reservationTimeoutMs,
		lockTimeoutMs:
			adv.lockTimeoutMs ?? adapter.options?.lockTimeoutMs ?? DEFAULT_ADVANCED.lockTimeoutMs,
		maxTransactionAmount: adv.maxTransactionAmount ?? DEFAULT_ADVANCED.maxTransactionAmount,
		statementDefaultLimit: adv.statementDefaultLimit ?? DEFAULT_ADVANCED.statementDefaultLimit,
		statementMaxLimit: adv.statementMaxLimit ?? DEFAULT_ADVANCED.statementMaxLimit,
		cursorSecret: adv.cursorSecret ?? fallbackCursorSecret(),
	};

	const schema = options.schema ?? "tallybook";
	const resolvedOptions: ResolvedTallybookOptions = { schema, advanced };

	// Adapters read these lazily from their options
	if (adapter.options) {
		adapter.options.schema = schema;
		adapter.options.lockTimeoutMs = advanced.lockTimeoutMs;
	}

	if (!adv.cursorSecret) {
		logger.warn(
			"cursorSecret is not configured. Statement cursors are signed with a per-process key and stop working after a restart. Set advanced.cursorSecret to keep them valid.",
		);
	}

	return {
		adapter,
		options: resolvedOptions,
		logger,
		clock: options.clock ?? createMonotonicClock(),
		generateId: options.generateId ?? generateId,
	};
}
