// =============================================================================
// FETCH INTEGRATION: Web Fetch API handler
// =============================================================================
// For any server that speaks Request/Response, including Node 20's own
// fetch types.

import type { Tallybook } from "../tallybook/base.js";
import type { ApiHandlerOptions, ApiRequest } from "./handler.js";
import { handleRequest } from "./handler.js";
import { errorResponse } from "./route.js";

/**
 * Create a Web Fetch API compatible handler for the ledger API.
 *
 * @example
 * ```ts
 * import { createTallybookFetchHandler } from "tallybook/api";
 *
 * const handler = createTallybookFetchHandler(tallybook, { basePath: "/api/ledger" });
 * const response = await handler(new Request("http://localhost/api/ledger/ok"));
 * ```
 */
export function createTallybookFetchHandler(
	tallybook: Tallybook,
	options: { basePath?: string } & ApiHandlerOptions = {},
): (request: Request) => Promise<Response> {
	const basePath = options.basePath ?? "";

	return async (request: Request): Promise<Response> => {
		const url = new URL(request.url);
		let path = url.pathname;
		if (basePath && path.startsWith(basePath)) {
			path = path.slice(basePath.length) || "/";
		}

		const query: Record<string, string | undefined> = {};
		for (const [key, value] of url.searchParams) {
			query[key] = value;
		}

		const headers: Record<string, string> = {};
		request.headers.forEach((value, key) => {
			headers[key] = value;
		});

		let body: unknown;
		if (request.method !== "GET" && request.method !== "HEAD") {
			const text = await request.text();
			if (text.length > 0) {
				try {
					body = JSON.parse(text);
				} catch {
					const res = errorResponse(400, "INVALID_ARGUMENT", "Request body is not valid JSON");
					return new Response(JSON.stringify(res.body), { status: res.status, headers: res.headers });
				}
			}
		}

		const apiReq: ApiRequest = { method: request.method, path, body, query, headers };
		const apiRes = await handleRequest(tallybook, apiReq, options);

		return new Response(apiRes.status === 204 ? null : JSON.stringify(apiRes.body), {
			status: apiRes.status,
			headers: apiRes.headers,
		});
	};
}
