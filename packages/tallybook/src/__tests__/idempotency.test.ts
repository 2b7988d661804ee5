import { computeFingerprint, LedgerError } from "@tallybook/core";
import { getTestInstance } from "@tallybook/test-utils";
import { describe, expect, it } from "vitest";
import { MODELS } from "../db/schema.js";
import {
	commitIdempotency,
	lookupOrReserve,
	releaseIdempotency,
} from "../managers/idempotency.js";
import { parseStoredAccount } from "../managers/row-mappers.js";

const account = {
	id: "acct-1",
	ownerName: "Alice",
	balance: 100,
	createdAt: "2024-01-01T00:00:00.000Z",
};

async function registry(advanced?: { idempotencyTTL?: number }) {
	const instance = await getTestInstance({ advanced });
	const ctx = await instance.tallybook.$context;
	const reserve = (key: string, fingerprint = "fp-a") =>
		ctx.adapter.transaction((tx) =>
			lookupOrReserve(tx, ctx, { route: "deposit", key, fingerprint }, parseStoredAccount),
		);
	const countRecords = () => ctx.adapter.count({ model: MODELS.idempotency });
	return { ...instance, ctx, reserve, countRecords };
}

// =============================================================================
// REGISTRY
// =============================================================================

describe("lookupOrReserve", () => {
	it("reserves a new key, then reports it in progress until committed", async () => {
		const { ctx, reserve } = await registry();

		expect(await reserve("k")).toEqual({ status: "reserved" });
		expect(await reserve("k")).toEqual({ status: "in_progress" });

		await ctx.adapter.transaction((tx) =>
			commitIdempotency(tx, ctx, { route: "deposit", key: "k", result: account }),
		);
		expect(await reserve("k")).toEqual({ status: "existing", result: account });
	});

	it("reports a different fingerprint as a conflict", async () => {
		const { reserve } = await registry();
		await reserve("k", "fp-a");
		expect(await reserve("k", "fp-b")).toEqual({ status: "conflict" });
	});

	it("scopes keys by route", async () => {
		const { ctx, reserve } = await registry();
		await reserve("k");
		const other = await ctx.adapter.transaction((tx) =>
			lookupOrReserve(
				tx,
				ctx,
				{ route: "withdraw", key: "k", fingerprint: "fp-z" },
				parseStoredAccount,
			),
		);
		expect(other).toEqual({ status: "reserved" });
	});

	it("frees a released reservation", async () => {
		const { ctx, reserve, countRecords } = await registry();
		await reserve("k");
		await ctx.adapter.transaction((tx) => releaseIdempotency(tx, { route: "deposit", key: "k" }));

		expect(await countRecords()).toBe(0);
		expect(await reserve("k", "fp-b")).toEqual({ status: "reserved" });
	});

	it("reclaims a reservation abandoned for longer than the timeout", async () => {
		const { clock, reserve } = await registry();
		await reserve("k", "fp-a");

		clock.advance(29_999);
		expect(await reserve("k", "fp-a")).toEqual({ status: "in_progress" });

		clock.advance(1);
		expect(await reserve("k", "fp-b")).toEqual({ status: "reserved" });
	});

	it("fails when committing a key that was never reserved", async () => {
		const { ctx } = await registry();
		const error = await ctx.adapter
			.transaction((tx) => commitIdempotency(tx, ctx, { route: "deposit", key: "k", result: account }))
			.then(
				() => null,
				(e: unknown) => e,
			);
		expect(LedgerError.is(error, "INTERNAL")).toBe(true);
	});
});

// =============================================================================
// ENGINE INTEGRATION
// =============================================================================

describe("idempotent operations", () => {
	it("reports a request whose key is still reserved as IDEMPOTENCY_IN_PROGRESS", async () => {
		const { tallybook, ctx, clock } = await registry();
		const alice = await tallybook.accounts.create({ ownerName: "Alice" });
		const fingerprint = computeFingerprint({
			route: "deposit",
			accountId: alice.id,
			amount: 10,
			memo: null,
		});
		await ctx.adapter.transaction((tx) =>
			lookupOrReserve(tx, ctx, { route: "deposit", key: "k", fingerprint }, parseStoredAccount),
		);

		const error = await tallybook.transactions
			.deposit({ accountId: alice.id, idempotencyKey: "k", amount: 10 })
			.then(
				() => null,
				(e: unknown) => e,
			);
		expect(LedgerError.is(error, "IDEMPOTENCY_IN_PROGRESS")).toBe(true);

		clock.advance(30_000);
		const account = await tallybook.transactions.deposit({
			accountId: alice.id,
			idempotencyKey: "k",
			amount: 10,
		});
		expect(account.balance).toBe(10);
	});

	it("treats an omitted memo and a null memo as the same request", async () => {
		const { tallybook } = await registry();
		const alice = await tallybook.accounts.create({ ownerName: "Alice" });

		await tallybook.transactions.deposit({ accountId: alice.id, idempotencyKey: "k", amount: 10 });
		const replay = await tallybook.transactions.deposit({
			accountId: alice.id,
			idempotencyKey: "k",
			amount: 10,
			memo: null,
		});
		expect(replay.balance).toBe(10);
	});

	it("applies a repeated key again once its record has expired", async () => {
		const { tallybook, clock } = await registry({ idempotencyTTL: 1000 });
		const alice = await tallybook.accounts.create({ ownerName: "Alice" });
		const params = { accountId: alice.id, idempotencyKey: "k", amount: 10 };

		await tallybook.transactions.deposit(params);
		clock.advance(999);
		expect((await tallybook.transactions.deposit(params)).balance).toBe(10);

		clock.advance(1);
		expect((await tallybook.transactions.deposit(params)).balance).toBe(20);
	});
});

// =============================================================================
// CLEANUP
// =============================================================================

describe("cleanupExpired", () => {
	it("deletes expired results and abandoned reservations only", async () => {
		const { tallybook, clock, reserve, countRecords } = await registry({ idempotencyTTL: 60_000 });
		const alice = await tallybook.accounts.create({ ownerName: "Alice" });

		await tallybook.transactions.deposit({ accountId: alice.id, idempotencyKey: "old", amount: 1 });
		await reserve("abandoned");
		clock.advance(30_000);
		await tallybook.transactions.deposit({ accountId: alice.id, idempotencyKey: "fresh", amount: 1 });
		clock.advance(30_000);

		// "old" expired at +60s, "abandoned" passed the 30s timeout, "fresh" has 30s left
		expect(await countRecords()).toBe(3);
		expect(await tallybook.idempotency.cleanupExpired()).toEqual({ deleted: 2 });
		expect(await countRecords()).toBe(1);
		expect(await tallybook.idempotency.cleanupExpired()).toEqual({ deleted: 0 });
	});
});
