import type { LedgerAdapter, TallybookAdvancedOptions, TallybookLogger } from "@tallybook/core";
import { createManualClock, type ManualClock, silentLogger } from "@tallybook/core";
import { memoryAdapter } from "@tallybook/memory-adapter";
import { createTallybook, type Tallybook } from "tallybook";

export interface TestInstanceOptions {
	/** Storage adapter. Default: a fresh memoryAdapter() */
	adapter?: LedgerAdapter;
	/** Start of the manual clock. Default: 2024-01-01T00:00:00.000Z */
	startAt?: string;
	/** Deterministic id source, e.g. a counter */
	generateId?: () => string;
	/** Default: a logger that drops everything */
	logger?: TallybookLogger;
	advanced?: TallybookAdvancedOptions;
}

export interface TestInstance {
	tallybook: Tallybook;
	adapter: LedgerAdapter;
	/** Drives every timestamp the ledger writes */
	clock: ManualClock;
}

export async function getTestInstance(options: TestInstanceOptions = {}): Promise<TestInstance> {
	const adapter = options.adapter ?? memoryAdapter();
	const clock = createManualClock(options.startAt);
	const tallybook = createTallybook({
		database: adapter,
		clock,
		generateId: options.generateId,
		logger: options.logger ?? silentLogger,
		advanced: { cursorSecret: "test-secret", ...options.advanced },
	});

	// Wait for initialization
	await tallybook.$context;

	return { tallybook, adapter, clock };
}

/** Ids of the form `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = "id"): () => string {
	let next = 0;
	return () => {
		next += 1;
		return `${prefix}-${String(next).padStart(6, "0")}`;
	};
}
