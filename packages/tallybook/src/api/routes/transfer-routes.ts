// =============================================================================
// TRANSFER ROUTES
// =============================================================================

import type { Route } from "../route.js";
import { defineRoute, json } from "../route.js";
import { serializeTransfer } from "../serializers.js";
import { header, numberField, optionalStringField, readBody, stringField } from "../validation.js";

export const transferRoutes: Route[] = [
	defineRoute("POST", "/transfers", async (req, tallybook) => {
		const body = readBody(req.body, {
			source_account_id: "string",
			dest_account_id: "string",
			amount: "number",
			memo: "string?",
		});
		const result = await tallybook.transactions.transfer({
			idempotencyKey: header(req, "Idempotency-Key") ?? "",
			sourceAccountId: stringField(body, "source_account_id"),
			destinationAccountId: stringField(body, "dest_account_id"),
			amount: numberField(body, "amount"),
			memo: optionalStringField(body, "memo"),
		});
		return json(200, serializeTransfer(result));
	}),
];
