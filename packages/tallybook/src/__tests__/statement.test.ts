import { LedgerError } from "@tallybook/core";
import { getTestInstance, sequentialIds } from "@tallybook/test-utils";
import { describe, expect, it } from "vitest";

// Entries: two at T0, three at T0 + 1s. Ids are sequential, so newest-first
// order is id-000006 .. id-000002.
async function seededLedger() {
	const instance = await getTestInstance({ generateId: sequentialIds("id") });
	const { tallybook, clock } = instance;
	const account = await tallybook.accounts.create({ ownerName: "Alice" });

	const deposit = (n: number) =>
		tallybook.transactions.deposit({ accountId: account.id, idempotencyKey: `d-${n}`, amount: n });

	await deposit(1);
	await deposit(2);
	clock.advance(1000);
	await deposit(3);
	await deposit(4);
	await deposit(5);

	return { ...instance, account, deposit };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
	return promise.then(
		() => null,
		(e: unknown) => e,
	);
}

describe("statements", () => {
	it("lists entries newest first by timestamp, then id", async () => {
		const { tallybook, account } = await seededLedger();
		const page = await tallybook.statements.list(account.id);

		expect(account.id).toBe("id-000001");
		expect(page.items.map((e) => e.id)).toEqual([
			"id-000006",
			"id-000005",
			"id-000004",
			"id-000003",
			"id-000002",
		]);
		expect(page.items.map((e) => e.amount)).toEqual([5, 4, 3, 2, 1]);
		expect(page.items[0]?.ts).toBe("2024-01-01T00:00:01.000Z");
		expect(page.items[4]?.ts).toBe("2024-01-01T00:00:00.000Z");
		expect(page.nextCursor).toBeNull();
	});

	it("pages through every entry with limit=2 without gaps or repeats", async () => {
		const { tallybook, account } = await seededLedger();

		const first = await tallybook.statements.list(account.id, { limit: 2 });
		expect(first.items.map((e) => e.amount)).toEqual([5, 4]);
		expect(first.nextCursor).not.toBeNull();

		const second = await tallybook.statements.list(account.id, { limit: 2, cursor: first.nextCursor });
		expect(second.items.map((e) => e.amount)).toEqual([3, 2]);
		expect(second.nextCursor).not.toBeNull();

		const third = await tallybook.statements.list(account.id, { limit: 2, cursor: second.nextCursor });
		expect(third.items.map((e) => e.amount)).toEqual([1]);
		expect(third.nextCursor).toBeNull();
	});

	it("returns a null cursor when the last page is exactly full", async () => {
		const { tallybook, account } = await seededLedger();
		const page = await tallybook.statements.list(account.id, { limit: 5 });
		expect(page.items).toHaveLength(5);
		expect(page.nextCursor).toBeNull();
	});

	it("keeps later pages stable when new entries arrive", async () => {
		const { tallybook, account, clock, deposit } = await seededLedger();
		const first = await tallybook.statements.list(account.id, { limit: 2 });

		clock.advance(1000);
		await deposit(6);

		const second = await tallybook.statements.list(account.id, { limit: 2, cursor: first.nextCursor });
		expect(second.items.map((e) => e.amount)).toEqual([3, 2]);
	});

	it("returns an empty page for an account without entries", async () => {
		const { tallybook } = await getTestInstance();
		const account = await tallybook.accounts.create({ ownerName: "Bob" });
		expect(await tallybook.statements.list(account.id)).toEqual({ items: [], nextCursor: null });
	});

	it("reports an unknown account as NOT_FOUND", async () => {
		const { tallybook } = await getTestInstance();
		const error = await rejection(tallybook.statements.list("ghost"));
		expect(LedgerError.is(error, "NOT_FOUND")).toBe(true);
	});

	it.each([0, 201, 1.5])("rejects limit %s", async (limit) => {
		const { tallybook, account } = await seededLedger();
		const error = await rejection(tallybook.statements.list(account.id, { limit }));
		expect(error).toBeInstanceOf(LedgerError);
		expect(error instanceof LedgerError && error.message).toBe(
			"Limit must be an integer between 1 and 200",
		);
	});

	it("accepts the maximum limit", async () => {
		const { tallybook, account } = await seededLedger();
		const page = await tallybook.statements.list(account.id, { limit: 200 });
		expect(page.items).toHaveLength(5);
	});

	it("rejects a malformed or tampered cursor", async () => {
		const { tallybook, account } = await seededLedger();
		const { nextCursor } = await tallybook.statements.list(account.id, { limit: 2 });
		const tampered = `${nextCursor?.slice(0, -1)}${nextCursor?.endsWith("0") ? "1" : "0"}`;

		for (const cursor of ["garbage", tampered]) {
			const error = await rejection(tallybook.statements.list(account.id, { cursor }));
			expect(LedgerError.is(error, "INVALID_ARGUMENT")).toBe(true);
			expect(error instanceof Error && error.message).toBe("Invalid cursor");
		}
	});

	it("rejects a cursor issued for another account", async () => {
		const { tallybook, account } = await seededLedger();
		const other = await tallybook.accounts.create({ ownerName: "Bob" });
		const { nextCursor } = await tallybook.statements.list(account.id, { limit: 2 });

		const error = await rejection(tallybook.statements.list(other.id, { cursor: nextCursor }));
		expect(error instanceof Error && error.message).toBe("Cursor belongs to a different account");
	});
});
