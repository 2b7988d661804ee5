// =============================================================================
// IDEMPOTENCY REGISTRY
// =============================================================================
// Maps (route, key) to the result of the first successful request, so a
// retried request is answered without touching balances again.
//
// Protocol, all inside the caller's storage transaction:
//   lookupOrReserve -> reserved | existing | conflict | in_progress
//   reserved        -> run the operation -> commitIdempotency (success)
//                                        -> releaseIdempotency (failure)
//
// A per-key advisory lock serializes lookups on the same key, so two
// simultaneous requests never both reserve it; the second one waits and then
// sees the first one's committed result.

import type {
	IdempotentRoute,
	LedgerTransactionAdapter,
	ReservationResult,
	TallybookContext,
} from "@tallybook/core";
import { canonicalJson, idempotencyLockKey, LedgerError } from "@tallybook/core";
import { MODELS } from "../db/schema.js";
import { withStorageGuard } from "../infrastructure/storage-guard.js";
import { type IdempotencyRow, rawToIdempotencyRecord } from "./row-mappers.js";

export interface IdempotencyTarget {
	route: IdempotentRoute;
	key: string;
}

function keyWhere(target: IdempotencyTarget) {
	return [
		{ field: "route", operator: "eq" as const, value: target.route },
		{ field: "key", operator: "eq" as const, value: target.key },
	];
}

/**
 * Look up `(route, key)` and reserve it when it is free.
 *
 * Expired completed records and abandoned pending ones (older than
 * `reservationTimeoutMs`) are treated as free.
 */
export async function lookupOrReserve<T>(
	tx: LedgerTransactionAdapter,
	ctx: TallybookContext,
	params: IdempotencyTarget & { fingerprint: string },
	parseResult: (value: unknown) => T,
): Promise<ReservationResult<T>> {
	await tx.advisoryLock("idempotency", idempotencyLockKey(params.route, params.key));

	const now = ctx.clock.now();
	const row = await tx.findOne<IdempotencyRow>({
		model: MODELS.idempotency,
		where: keyWhere(params),
		forUpdate: true,
	});

	if (row) {
		const record = rawToIdempotencyRecord(row);
		const expired =
			record.status === "completed" && Date.parse(record.expiresAt) <= now.getTime();
		const abandoned =
			record.status === "pending" &&
			now.getTime() - Date.parse(record.createdAt) >= ctx.options.advanced.reservationTimeoutMs;

		if (!expired && !abandoned) {
			if (record.fingerprint !== params.fingerprint) {
				return { status: "conflict" };
			}
			if (record.status === "pending") {
				return { status: "in_progress" };
			}
			if (record.resultData === null) {
				throw LedgerError.internal(`Completed idempotency record ${params.route}/${params.key} has no result`);
			}
			return { status: "existing", result: parseResult(JSON.parse(record.resultData)) };
		}

		ctx.logger.debug("idempotency.reclaimed", {
			route: params.route,
			reason: expired ? "expired" : "abandoned",
		});
		await tx.delete({ model: MODELS.idempotency, where: keyWhere(params) });
	}

	await tx.create({
		model: MODELS.idempotency,
		data: {
			route: params.route,
			key: params.key,
			fingerprint: params.fingerprint,
			status: "pending",
			resultData: null,
			createdAt: now,
			completedAt: null,
			expiresAt: new Date(now.getTime() + ctx.options.advanced.reservationTimeoutMs),
		},
	});
	return { status: "reserved" };
}

/** Store the result of a reserved request and start its TTL. */
export async function commitIdempotency(
	tx: LedgerTransactionAdapter,
	ctx: TallybookContext,
	params: IdempotencyTarget & { result: unknown },
): Promise<void> {
	const now = ctx.clock.now();
	const updated = await tx.update<IdempotencyRow>({
		model: MODELS.idempotency,
		where: [...keyWhere(params), { field: "status", operator: "eq", value: "pending" }],
		update: {
			status: "completed",
			resultData: canonicalJson(params.result),
			completedAt: now,
			expiresAt: new Date(now.getTime() + ctx.options.advanced.idempotencyTTL),
		},
	});
	if (!updated) {
		throw LedgerError.internal(`No pending reservation for ${params.route}/${params.key}`);
	}
}

/** Drop a pending reservation so the key can be used again. */
export async function releaseIdempotency(
	tx: LedgerTransactionAdapter,
	params: IdempotencyTarget,
): Promise<void> {
	await tx.delete({
		model: MODELS.idempotency,
		where: [...keyWhere(params), { field: "status", operator: "eq", value: "pending" }],
	});
}

/**
 * Delete completed records past their TTL and abandoned reservations.
 * Intended for a periodic job.
 */
export async function cleanupExpiredIdempotencyRecords(
	ctx: TallybookContext,
): Promise<{ deleted: number }> {
	const now = ctx.clock.now();
	const abandonedBefore = new Date(now.getTime() - ctx.options.advanced.reservationTimeoutMs);

	const deleted = await withStorageGuard(ctx, "cleanupExpiredIdempotencyRecords", () =>
		ctx.adapter.transaction(async (tx) => {
			const completed = await tx.delete({
				model: MODELS.idempotency,
				where: [
					{ field: "status", operator: "eq", value: "completed" },
					{ field: "expiresAt", operator: "lte", value: now },
				],
			});
			const abandoned = await tx.delete({
				model: MODELS.idempotency,
				where: [
					{ field: "status", operator: "eq", value: "pending" },
					{ field: "createdAt", operator: "lte", value: abandonedBefore },
				],
			});
			return completed + abandoned;
		}),
	);

	if (deleted > 0) {
		ctx.logger.info("idempotency.cleanup", { deleted });
	}
	return { deleted };
}
