// =============================================================================
// EXPRESS INTEGRATION: Thin wrapper to mount the ledger API in Express
// =============================================================================

import type { Tallybook } from "../tallybook/base.js";
import type { ApiHandlerOptions, ApiRequest } from "./handler.js";
import { handleRequest } from "./handler.js";

/**
 * Create an Express-compatible request handler for the ledger API.
 * Errors are passed to `next` when one is given.
 *
 * @example
 * ```ts
 * import express from "express";
 * import { createTallybookExpress } from "tallybook/api";
 *
 * const app = express();
 * app.use(express.json());
 * app.use("/api/ledger", createTallybookExpress(tallybook));
 * ```
 */
export function createTallybookExpress(tallybook: Tallybook, options?: ApiHandlerOptions) {
	return async (
		req: {
			method: string;
			path: string;
			body: unknown;
			query: Record<string, unknown>;
			headers: Record<string, string | string[] | undefined>;
		},
		res: {
			status: (code: number) => { json: (body: unknown) => void };
			set: (headers: Record<string, string>) => void;
		},
		next?: (error?: unknown) => void,
	): Promise<void> => {
		const query: Record<string, string | undefined> = {};
		for (const [key, value] of Object.entries(req.query)) {
			query[key] = typeof value === "string" ? value : undefined;
		}

		// Flatten repeated headers to their first value
		const headers: Record<string, string> = {};
		for (const [key, value] of Object.entries(req.headers)) {
			if (typeof value === "string") {
				headers[key] = value;
			} else if (Array.isArray(value) && value[0] !== undefined) {
				headers[key] = value[0];
			}
		}

		const apiReq: ApiRequest = {
			method: req.method,
			path: req.path,
			body: req.body,
			query,
			headers,
		};

		try {
			const apiRes = await handleRequest(tallybook, apiReq, options);
			if (apiRes.headers) {
				res.set(apiRes.headers);
			}
			res.status(apiRes.status).json(apiRes.body);
		} catch (error) {
			if (!next) throw error;
			next(error);
		}
	};
}
