// =============================================================================
// STATEMENT MANAGER
// =============================================================================
// Newest-first entry listings with keyset pagination on (ts desc, id desc).
// Cursors name the last returned entry, so entries added later (which sort
// before it) never shift pages that were already handed out.

import type {
	LedgerEntry,
	StatementPage,
	StatementParams,
	TallybookContext,
	Where,
} from "@tallybook/core";
import { decodeCursor, encodeCursor, LedgerError } from "@tallybook/core";
import { MODELS } from "../db/schema.js";
import { withStorageGuard } from "../infrastructure/storage-guard.js";
import { type EntryRow, rawToEntry } from "./row-mappers.js";
import { validateAccountId } from "./validation.js";

const NEWEST_FIRST = [
	{ field: "ts", direction: "desc" as const },
	{ field: "id", direction: "desc" as const },
];

function resolveLimit(ctx: TallybookContext, limit: number | undefined): number {
	const { statementDefaultLimit, statementMaxLimit } = ctx.options.advanced;
	if (limit === undefined) return statementDefaultLimit;
	if (!Number.isInteger(limit) || limit < 1 || limit > statementMaxLimit) {
		throw LedgerError.invalidArgument(`Limit must be an integer between 1 and ${statementMaxLimit}`);
	}
	return limit;
}

export async function listEntries(
	ctx: TallybookContext,
	accountId: string,
	params: StatementParams = {},
): Promise<StatementPage<LedgerEntry>> {
	validateAccountId(accountId);
	const limit = resolveLimit(ctx, params.limit);
	const secret = ctx.options.advanced.cursorSecret;

	const cursor =
		params.cursor === undefined || params.cursor === null
			? null
			: decodeCursor(params.cursor, secret);
	if (params.cursor !== undefined && params.cursor !== null && !cursor) {
		throw LedgerError.invalidArgument("Invalid cursor");
	}
	if (cursor && cursor.accountId !== accountId) {
		throw LedgerError.invalidArgument("Cursor belongs to a different account");
	}

	const rows = await withStorageGuard(ctx, "listEntries", async () => {
		const account = await ctx.adapter.findOne({
			model: MODELS.account,
			where: [{ field: "id", operator: "eq", value: accountId }],
		});
		if (!account) throw LedgerError.notFound(`Account ${accountId} not found`);

		const byAccount: Where = { field: "accountId", operator: "eq", value: accountId };
		const page = (where: Where[], take: number) =>
			ctx.adapter.findMany<EntryRow>({
				model: MODELS.entry,
				where: [byAccount, ...where],
				sortBy: NEWEST_FIRST,
				limit: take,
			});

		// One extra row tells whether anything follows the page
		if (!cursor) return page([], limit + 1);

		const cursorTs = new Date(cursor.ts);
		const sameInstant = await page(
			[
				{ field: "ts", operator: "eq", value: cursorTs },
				{ field: "id", operator: "lt", value: cursor.id },
			],
			limit + 1,
		);
		if (sameInstant.length > limit) return sameInstant;

		const older = await page(
			[{ field: "ts", operator: "lt", value: cursorTs }],
			limit + 1 - sameInstant.length,
		);
		return [...sameInstant, ...older];
	});

	const items = rows.slice(0, limit).map(rawToEntry);
	const last = items[items.length - 1];
	const nextCursor =
		rows.length > limit && last
			? encodeCursor({ accountId, ts: last.ts, id: last.id }, secret)
			: null;

	return { items, nextCursor };
}
