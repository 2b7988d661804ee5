// =============================================================================
// MEMORY ADAPTER: LedgerAdapter implementation backed by in-memory Maps
// =============================================================================
// No external database required. Data is stored in nested Maps:
// model name -> row key -> record. Transactions buffer their writes and
// publish them in one synchronous step on commit, so readers outside the
// transaction never observe part of it. Advisory locks are real keyed locks
// held until the transaction ends.

import { randomUUID } from "node:crypto";
import type {
	LedgerAdapter,
	LedgerAdapterOptions,
	LedgerTransactionAdapter,
	LockNamespace,
	SortBy,
	Where,
} from "@tallybook/core";
import { inValues, toSortList } from "@tallybook/core";
import { KeyedLockManager } from "./locks.js";

type Row = Record<string, unknown>;
type ModelStore = Map<string, Row>;
type Store = Map<string, ModelStore>;

/** Pending writes of one transaction. `null` marks a deleted row. */
type WriteBuffer = Map<string, Map<string, Row | null>>;

export interface MemoryAdapterOptions {
	/** How long `advisoryLock` waits before failing with UNAVAILABLE. Default: 3000 */
	lockTimeoutMs?: number;
}


// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function rowKeyOf(record: Row): string {
	return typeof record.id === "string" ? record.id : randomUUID();
}

/** Comparable form of a stored value: Dates compare by instant. */
function comparable(value: unknown): unknown {
	return value instanceof Date ? value.getTime() : value;
}

function compare(a: unknown, b: unknown): number | null {
	const left = comparable(a);
	const right = comparable(b);
	if (typeof left === "number" && typeof right === "number") return left - right;
	if (typeof left === "string" && typeof right === "string") {
		return left < right ? -1 : left > right ? 1 : 0;
	}
	return null;
}

function matchesCondition(record: Row, condition: Where): boolean {
	const value = record[condition.field];

	switch (condition.operator) {
		case "eq":
			return comparable(value) === comparable(condition.value);
		case "ne":
			return comparable(value) !== comparable(condition.value);
		case "gt":
		case "gte":
		case "lt":
		case "lte": {
			const result = compare(value, condition.value);
			if (result === null) return false;
			if (condition.operator === "gt") return result > 0;
			if (condition.operator === "gte") return result >= 0;
			if (condition.operator === "lt") return result < 0;
			return result <= 0;
		}
		case "in":
			return inValues(condition.value).some((v) => comparable(v) === comparable(value));
		case "is_null":
			return value === null || value === undefined;
		case "is_not_null":
			return value !== null && value !== undefined;
		default:
			return false;
	}
}

function sortRecords(records: Row[], sortBy: SortBy[]): Row[] {
	return [...records].sort((a, b) => {
		for (const key of sortBy) {
			const aVal = a[key.field];
			const bVal = b[key.field];
			if (aVal === null || aVal === undefined) {
				if (bVal === null || bVal === undefined) continue;
				return 1;
			}
			if (bVal === null || bVal === undefined) return -1;

			const result = compare(aVal, bVal) ?? 0;
			if (result !== 0) return key.direction === "desc" ? -result : result;
		}
		return 0;
	});
}

// =============================================================================
// STORE VIEWS
// =============================================================================

/**
 * Read/write access to the store. Outside a transaction writes go straight
 * to the committed store; inside one they go to the transaction's buffer and
 * reads see the committed store overlaid with that buffer.
 */
interface StoreView {
	/** `[rowKey, record]` pairs */
	rows(model: string): Array<[string, Row]>;
	has(model: string, rowKey: string): boolean;
	put(model: string, rowKey: string, record: Row): void;
	remove(model: string, rowKey: string): void;
}

function committedView(store: Store): StoreView {
	const modelStore = (model: string): ModelStore => {
		let records = store.get(model);
		if (!records) {
			records = new Map();
			store.set(model, records);
		}
		return records;
	};
	return {
		rows: (model) => [...(store.get(model)?.entries() ?? [])],
		has: (model, rowKey) => store.get(model)?.has(rowKey) ?? false,
		put: (model, rowKey, record) => {
			modelStore(model).set(rowKey, record);
		},
		remove: (model, rowKey) => {
			store.get(model)?.delete(rowKey);
		},
	};
}

function bufferedView(store: Store, buffer: WriteBuffer): StoreView {
	const pending = (model: string) => {
		let writes = buffer.get(model);
		if (!writes) {
			writes = new Map();
			buffer.set(model, writes);
		}
		return writes;
	};
	return {
		rows: (model) => {
			const merged = new Map(store.get(model) ?? []);
			for (const [rowKey, record] of buffer.get(model) ?? []) {
				if (record === null) merged.delete(rowKey);
				else merged.set(rowKey, record);
			}
			return [...merged.entries()];
		},
		has: (model, rowKey) => {
			const write = buffer.get(model)?.get(rowKey);
			if (write !== undefined) return write !== null;
			return store.get(model)?.has(rowKey) ?? false;
		},
		put: (model, rowKey, record) => {
			pending(model).set(rowKey, record);
		},
		remove: (model, rowKey) => {
			pending(model).set(rowKey, null);
		},
	};
}

function publish(store: Store, buffer: WriteBuffer): void {
	const view = committedView(store);
	for (const [model, writes] of buffer) {
		for (const [rowKey, record] of writes) {
			if (record === null) view.remove(model, rowKey);
			else view.put(model, rowKey, record);
		}
	}
}

// =============================================================================
// ADAPTER METHODS BUILDER
// =============================================================================

function buildAdapterMethods(
	view: StoreView,
	lock: (namespace: LockNamespace, key: number) => Promise<void>,
): Omit<LedgerTransactionAdapter, "id" | "options"> {
	const filter = (model: string, where: Where[]): Array<[string, Row]> =>
		view.rows(model).filter(([, r]) => where.every((w) => matchesCondition(r, w)));

	const detach = (record: Row): Row => ({ ...record });

	return {
		create: async <T extends Record<string, unknown>>({
			model,
			data,
		}: {
			model: string;
			data: T;
		}): Promise<T> => {
			const rowKey = rowKeyOf(data);
			if (view.has(model, rowKey)) {
				throw new Error(`Duplicate key "${rowKey}" in ${model}`);
			}
			view.put(model, rowKey, { ...data });
			return { ...data };
		},

		findOne: async <T>({
			model,
			where,
		}: {
			model: string;
			where: Where[];
			forUpdate?: boolean;
		}): Promise<T | null> => {
			const first = filter(model, where)[0];
			if (!first) return null;
			return detach(first[1]) as T;
		},

		findMany: async <T>({
			model,
			where,
			limit,
			sortBy,
		}: {
			model: string;
			where?: Where[];
			limit?: number;
			sortBy?: SortBy | SortBy[];
		}): Promise<T[]> => {
			let results = sortRecords(
				filter(model, where ?? []).map(([, r]) => r),
				toSortList(sortBy),
			);
			if (limit !== undefined) results = results.slice(0, limit);
			return results.map((r) => detach(r) as T);
		},

		update: async <T>({
			model,
			where,
			update: updateData,
		}: {
			model: string;
			where: Where[];
			update: Record<string, unknown>;
		}): Promise<T | null> => {
			const first = filter(model, where)[0];
			if (!first) return null;

			const [rowKey, current] = first;
			const updated: Row = { ...current, ...updateData };
			view.put(model, rowKey, updated);
			return detach(updated) as T;
		},

		delete: async ({ model, where }: { model: string; where: Where[] }): Promise<number> => {
			let deleted = 0;
			for (const [rowKey] of filter(model, where)) {
				view.remove(model, rowKey);
				deleted++;
			}
			return deleted;
		},

		count: async ({ model, where }: { model: string; where?: Where[] }): Promise<number> => {
			return filter(model, where ?? []).length;
		},

		advisoryLock: lock,
	};
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a LedgerAdapter backed by an in-memory store.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@tallybook/memory-adapter";
 *
 * const ledger = createTallybook({ database: memoryAdapter() });
 * ```
 */
export function memoryAdapter(options: MemoryAdapterOptions = {}): LedgerAdapter {
	const store: Store = new Map();
	const adapterOptions: LedgerAdapterOptions = {
		supportsAdvisoryLocks: true,
		supportsForUpdate: false,
		supportsReturning: true,
		dialectName: "memory",
		lockTimeoutMs: options.lockTimeoutMs ?? 3000,
	};
	const locks = new KeyedLockManager(() => adapterOptions.lockTimeoutMs ?? 3000);

	const methods = buildAdapterMethods(committedView(store), async (namespace, key) => {
		// Outside a transaction the lock is released as soon as it is acquired.
		const owner = Symbol("lock");
		await locks.acquire(namespace, key, owner);
		locks.releaseAll(owner);
	});

	return {
		id: "memory",
		...methods,

		transaction: async <T>(fn: (tx: LedgerTransactionAdapter) => Promise<T>): Promise<T> => {
			const owner = Symbol("transaction");
			const buffer: WriteBuffer = new Map();
			const txAdapter: LedgerTransactionAdapter = {
				id: "memory",
				...buildAdapterMethods(bufferedView(store, buffer), (namespace, key) =>
					locks.acquire(namespace, key, owner),
				),
				options: adapterOptions,
			};

			try {
				const result = await fn(txAdapter);
				publish(store, buffer);
				return result;
			} finally {
				locks.releaseAll(owner);
			}
		},

		options: adapterOptions,
	};
}
