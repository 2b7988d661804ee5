import { LedgerError } from "@tallybook/core";
import { describe, expect, it } from "vitest";
import { memoryAdapter } from "../adapter.js";

type Row = Record<string, unknown>;

describe("memoryAdapter", () => {
	it("returns an adapter with id 'memory'", () => {
		expect(memoryAdapter().id).toBe("memory");
	});

	it("exposes expected adapter options", () => {
		expect(memoryAdapter().options).toEqual({
			supportsAdvisoryLocks: true,
			supportsForUpdate: false,
			supportsReturning: true,
			dialectName: "memory",
			lockTimeoutMs: 3000,
		});
	});

	it("takes the lock timeout from its options", () => {
		expect(memoryAdapter({ lockTimeoutMs: 250 }).options?.lockTimeoutMs).toBe(250);
	});

	// =========================================================================
	// CRUD
	// =========================================================================

	describe("create", () => {
		it("stores a copy of the data", async () => {
			const adapter = memoryAdapter();
			const data = { id: "a1", ownerName: "Alice", balance: 0 };
			await adapter.create({ model: "account", data });
			data.balance = 999;

			const found = await adapter.findOne<Row>({
				model: "account",
				where: [{ field: "id", operator: "eq", value: "a1" }],
			});
			expect(found).toEqual({ id: "a1", ownerName: "Alice", balance: 0 });
		});

		it("rejects a duplicate id", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "account", data: { id: "a1" } });
			await expect(adapter.create({ model: "account", data: { id: "a1" } })).rejects.toThrow(
				'Duplicate key "a1" in account',
			);
		});

		it("stores rows without an id", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "idempotency_record", data: { route: "deposit", key: "k1" } });
			await adapter.create({ model: "idempotency_record", data: { route: "deposit", key: "k2" } });
			expect(await adapter.count({ model: "idempotency_record" })).toBe(2);
		});
	});

	describe("findOne", () => {
		it("returns null for an unknown model or no match", async () => {
			const adapter = memoryAdapter();
			expect(await adapter.findOne({ model: "nothing", where: [] })).toBeNull();
			await adapter.create({ model: "account", data: { id: "a1" } });
			expect(
				await adapter.findOne({
					model: "account",
					where: [{ field: "id", operator: "eq", value: "a2" }],
				}),
			).toBeNull();
		});

		it("returns detached copies", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "account", data: { id: "a1", balance: 5 } });
			const where = [{ field: "id", operator: "eq" as const, value: "a1" }];
			const first = await adapter.findOne<Row>({ model: "account", where });
			if (first) first.balance = 100;
			expect(await adapter.findOne<Row>({ model: "account", where })).toEqual({ id: "a1", balance: 5 });
		});
	});

	describe("findMany", () => {
		async function seedEntries() {
			const adapter = memoryAdapter();
			const t1 = new Date("2024-01-01T00:00:01.000Z");
			const t2 = new Date("2024-01-01T00:00:02.000Z");
			for (const [id, ts] of [
				["e1", t1],
				["e3", t1],
				["e2", t2],
				["e4", t2],
			] as const) {
				await adapter.create({ model: "ledger_entry", data: { id, ts, accountId: "a1" } });
			}
			await adapter.create({ model: "ledger_entry", data: { id: "x", ts: t2, accountId: "a2" } });
			return { adapter, t1, t2 };
		}

		it("sorts by several keys", async () => {
			const { adapter } = await seedEntries();
			const rows = await adapter.findMany<Row>({
				model: "ledger_entry",
				where: [{ field: "accountId", operator: "eq", value: "a1" }],
				sortBy: [
					{ field: "ts", direction: "desc" },
					{ field: "id", direction: "desc" },
				],
			});
			expect(rows.map((r) => r.id)).toEqual(["e4", "e2", "e3", "e1"]);
		});

		it("compares Dates by instant", async () => {
			const { adapter, t2 } = await seedEntries();
			const rows = await adapter.findMany<Row>({
				model: "ledger_entry",
				where: [
					{ field: "accountId", operator: "eq", value: "a1" },
					{ field: "ts", operator: "eq", value: new Date(t2.getTime()) },
					{ field: "id", operator: "lt", value: "e4" },
				],
			});
			expect(rows.map((r) => r.id)).toEqual(["e2"]);
		});

		it("applies limit after sorting", async () => {
			const { adapter } = await seedEntries();
			const rows = await adapter.findMany<Row>({
				model: "ledger_entry",
				where: [{ field: "accountId", operator: "eq", value: "a1" }],
				sortBy: { field: "id", direction: "desc" },
				limit: 2,
			});
			expect(rows.map((r) => r.id)).toEqual(["e4", "e3"]);
		});

		it("supports in, ne and null checks", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "ledger_entry", data: { id: "e1", transferId: null } });
			await adapter.create({ model: "ledger_entry", data: { id: "e2", transferId: "t1" } });
			await adapter.create({ model: "ledger_entry", data: { id: "e3", transferId: "t2" } });

			const ids = async (where: Parameters<typeof adapter.findMany>[0]["where"]) =>
				(await adapter.findMany<Row>({ model: "ledger_entry", where, sortBy: { field: "id", direction: "asc" } })).map(
					(r) => r.id,
				);

			expect(await ids([{ field: "transferId", operator: "in", value: ["t1", "t2"] }])).toEqual(["e2", "e3"]);
			expect(await ids([{ field: "transferId", operator: "is_null", value: null }])).toEqual(["e1"]);
			expect(await ids([{ field: "transferId", operator: "is_not_null", value: null }])).toEqual([
				"e2",
				"e3",
			]);
			expect(await ids([{ field: "id", operator: "ne", value: "e2" }])).toEqual(["e1", "e3"]);
		});
	});

	describe("update and delete", () => {
		it("updates the first match and returns the new row", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "account", data: { id: "a1", balance: 0 } });
			const updated = await adapter.update<Row>({
				model: "account",
				where: [{ field: "id", operator: "eq", value: "a1" }],
				update: { balance: 70 },
			});
			expect(updated).toEqual({ id: "a1", balance: 70 });
		});

		it("returns null when nothing matches an update", async () => {
			const adapter = memoryAdapter();
			expect(
				await adapter.update({
					model: "account",
					where: [{ field: "id", operator: "eq", value: "missing" }],
					update: { balance: 1 },
				}),
			).toBeNull();
		});

		it("deletes every match and reports how many", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "idempotency_record", data: { key: "k1", status: "completed" } });
			await adapter.create({ model: "idempotency_record", data: { key: "k2", status: "completed" } });
			await adapter.create({ model: "idempotency_record", data: { key: "k3", status: "pending" } });

			const deleted = await adapter.delete({
				model: "idempotency_record",
				where: [{ field: "status", operator: "eq", value: "completed" }],
			});

			expect(deleted).toBe(2);
			expect(await adapter.count({ model: "idempotency_record" })).toBe(1);
		});
	});

	// =========================================================================
	// TRANSACTIONS
	// =========================================================================

	describe("transaction", () => {
		const byId = (id: string) => [{ field: "id", operator: "eq" as const, value: id }];

		it("commits every write together", async () => {
			const adapter = memoryAdapter();
			await adapter.transaction(async (tx) => {
				await tx.create({ model: "account", data: { id: "a1", balance: 0 } });
				await tx.update({ model: "account", where: byId("a1"), update: { balance: 10 } });
			});
			expect(await adapter.findOne<Row>({ model: "account", where: byId("a1") })).toEqual({
				id: "a1",
				balance: 10,
			});
		});

		it("discards every write when the callback throws", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "account", data: { id: "a1", balance: 5 } });

			await expect(
				adapter.transaction(async (tx) => {
					await tx.update({ model: "account", where: byId("a1"), update: { balance: 0 } });
					await tx.create({ model: "ledger_entry", data: { id: "e1" } });
					throw new Error("boom");
				}),
			).rejects.toThrow("boom");

			expect(await adapter.findOne<Row>({ model: "account", where: byId("a1") })).toEqual({
				id: "a1",
				balance: 5,
			});
			expect(await adapter.count({ model: "ledger_entry" })).toBe(0);
		});

		it("reads its own writes", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "account", data: { id: "a1", balance: 5 } });

			await adapter.transaction(async (tx) => {
				await tx.update({ model: "account", where: byId("a1"), update: { balance: 8 } });
				await tx.delete({ model: "account", where: byId("a1") });
				expect(await tx.findOne({ model: "account", where: byId("a1") })).toBeNull();
				await tx.create({ model: "account", data: { id: "a1", balance: 1 } });
				expect(await tx.findOne<Row>({ model: "account", where: byId("a1") })).toEqual({
					id: "a1",
					balance: 1,
				});
			});
		});

		it("hides uncommitted writes from other readers", async () => {
			const adapter = memoryAdapter();
			let release: () => void = () => {};
			const gate = new Promise<void>((resolve) => {
				release = resolve;
			});

			const pending = adapter.transaction(async (tx) => {
				await tx.create({ model: "account", data: { id: "a1" } });
				await gate;
			});

			await Promise.resolve();
			expect(await adapter.count({ model: "account" })).toBe(0);
			release();
			await pending;
			expect(await adapter.count({ model: "account" })).toBe(1);
		});
	});

	// =========================================================================
	// ADVISORY LOCKS
	// =========================================================================

	describe("advisoryLock", () => {
		it("serializes transactions on the same key", async () => {
			const adapter = memoryAdapter();
			const order: string[] = [];

			const run = (name: string) =>
				adapter.transaction(async (tx) => {
					await tx.advisoryLock("account", 7);
					order.push(`${name}:start`);
					await new Promise((resolve) => setTimeout(resolve, 5));
					order.push(`${name}:end`);
				});

			await Promise.all([run("a"), run("b")]);
			expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
		});

		it("keeps namespaces apart for the same numeric key", async () => {
			const adapter = memoryAdapter({ lockTimeoutMs: 20 });
			await adapter.transaction(async (tx) => {
				await tx.advisoryLock("idempotency", 5);
				const other = adapter.transaction(async (inner) => {
					await inner.advisoryLock("account", 5);
					return "acquired";
				});
				await expect(other).resolves.toBe("acquired");
			});
		});

		it("is reentrant within one transaction", async () => {
			const adapter = memoryAdapter();
			await adapter.transaction(async (tx) => {
				await tx.advisoryLock("account", 1);
				await tx.advisoryLock("account", 1);
			});
		});

		it("releases locks when the transaction fails", async () => {
			const adapter = memoryAdapter({ lockTimeoutMs: 50 });
			await expect(
				adapter.transaction(async (tx) => {
					await tx.advisoryLock("account", 3);
					throw new Error("fail");
				}),
			).rejects.toThrow("fail");

			await adapter.transaction(async (tx) => {
				await tx.advisoryLock("account", 3);
			});
		});

		it("fails with UNAVAILABLE after the lock timeout", async () => {
			const adapter = memoryAdapter({ lockTimeoutMs: 20 });
			let release: () => void = () => {};
			const gate = new Promise<void>((resolve) => {
				release = resolve;
			});

			const holder = adapter.transaction(async (tx) => {
				await tx.advisoryLock("account", 9);
				await gate;
			});

			const waiter = adapter.transaction(async (tx) => {
				await tx.advisoryLock("account", 9);
			});

			const error = await waiter.catch((e: unknown) => e);
			expect(LedgerError.is(error, "UNAVAILABLE")).toBe(true);
			release();
			await holder;
		});

		it("waits for a transaction-held lock outside a transaction", async () => {
			const adapter = memoryAdapter();
			const order: string[] = [];
			let release: () => void = () => {};
			const gate = new Promise<void>((resolve) => {
				release = resolve;
			});

			const holder = adapter.transaction(async (tx) => {
				await tx.advisoryLock("account", 4);
				await gate;
				order.push("holder done");
			});
			const outside = adapter.advisoryLock("account", 4).then(() => {
				order.push("outside acquired");
			});

			await Promise.resolve();
			release();
			await Promise.all([holder, outside]);
			expect(order).toEqual(["holder done", "outside acquired"]);
		});
	});
});
