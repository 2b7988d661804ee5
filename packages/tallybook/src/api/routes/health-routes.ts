// =============================================================================
// HEALTH ROUTES
// =============================================================================

import { MODELS } from "../../db/schema.js";
import type { Route } from "../route.js";
import { defineRoute, json } from "../route.js";

export const healthRoutes: Route[] = [
	defineRoute("GET", "/ok", async () => {
		return json(200, { ok: true });
	}),

	// Deep check: one read against the account table
	defineRoute("GET", "/health", async (_req, tallybook, _params, options) => {
		const ctx = await tallybook.$context;
		const app = options.appName ?? "Tallybook";
		try {
			await ctx.adapter.count({ model: MODELS.account });
			return json(200, { status: "ok", app, adapter: ctx.adapter.id });
		} catch (error) {
			ctx.logger.error("health.failed", {
				error: error instanceof Error ? error.message : String(error),
			});
			return json(503, { status: "unavailable", app, adapter: ctx.adapter.id });
		}
	}),
];
