// =============================================================================
// ACCOUNT ROUTES
// =============================================================================

import type { Route } from "../route.js";
import { defineRoute, json } from "../route.js";
import { serializeAccount, serializeStatement } from "../serializers.js";
import {
	header,
	numberField,
	optionalStringField,
	parseLimit,
	readBody,
	stringField,
} from "../validation.js";

export const accountRoutes: Route[] = [
	defineRoute("POST", "/accounts", async (req, tallybook) => {
		const body = readBody(req.body, { owner_name: "string" });
		const account = await tallybook.accounts.create({ ownerName: stringField(body, "owner_name") });
		return json(201, serializeAccount(account));
	}),

	defineRoute("GET", "/accounts/:id", async (_req, tallybook, params) => {
		const account = await tallybook.accounts.get(params.id ?? "");
		return json(200, serializeAccount(account));
	}),

	defineRoute("POST", "/accounts/:id/deposit", async (req, tallybook, params) => {
		const body = readBody(req.body, { amount: "number", memo: "string?" });
		const account = await tallybook.transactions.deposit({
			accountId: params.id ?? "",
			idempotencyKey: header(req, "Idempotency-Key") ?? "",
			amount: numberField(body, "amount"),
			memo: optionalStringField(body, "memo"),
		});
		return json(200, serializeAccount(account));
	}),

	defineRoute("POST", "/accounts/:id/withdraw", async (req, tallybook, params) => {
		const body = readBody(req.body, { amount: "number", memo: "string?" });
		const account = await tallybook.transactions.withdraw({
			accountId: params.id ?? "",
			idempotencyKey: header(req, "Idempotency-Key") ?? "",
			amount: numberField(body, "amount"),
			memo: optionalStringField(body, "memo"),
		});
		return json(200, serializeAccount(account));
	}),

	defineRoute("GET", "/accounts/:id/statement", async (req, tallybook, params) => {
		const page = await tallybook.statements.list(params.id ?? "", {
			limit: parseLimit(req.query.limit),
			cursor: req.query.cursor || null,
		});
		return json(200, serializeStatement(page));
	}),
];
