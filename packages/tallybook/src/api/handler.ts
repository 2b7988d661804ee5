// =============================================================================
// API HANDLER: Framework-agnostic router for ledger operations
// =============================================================================

import { randomUUID } from "node:crypto";
import { LedgerError } from "@tallybook/core";
import type { Tallybook } from "../tallybook/base.js";
import { errorResponse, matchRoute } from "./route.js";
import { routes } from "./routes/index.js";

// =============================================================================
// TYPES
// =============================================================================

export interface ApiRequest {
	method: string;
	path: string;
	body: unknown;
	query: Record<string, string | undefined>;
	headers?: Record<string, string>;
}

export interface ApiResponse {
	status: number;
	body: unknown;
	headers?: Record<string, string>;
}

export interface ApiHandlerOptions {
	/** Name reported by the health endpoint. Default: "Tallybook" */
	appName?: string;
	/** Request interceptor. Return an ApiResponse to short-circuit (e.g., 401 for auth). */
	onRequest?: (req: ApiRequest) => ApiRequest | ApiResponse | Promise<ApiRequest | ApiResponse>;
	/** Response interceptor. Runs after route handler. */
	onResponse?: (req: ApiRequest, res: ApiResponse) => ApiResponse | Promise<ApiResponse>;
}

function isApiResponse(value: ApiRequest | ApiResponse): value is ApiResponse {
	return "status" in value;
}

// =============================================================================
// REQUEST HANDLER
// =============================================================================

export async function handleRequest(
	tallybook: Tallybook,
	req: ApiRequest,
	options: ApiHandlerOptions = {},
): Promise<ApiResponse> {
	const requestId = req.headers?.["x-request-id"] ?? randomUUID();
	const withHeaders = (response: ApiResponse): ApiResponse => ({
		...response,
		headers: {
			"X-Content-Type-Options": "nosniff",
			...response.headers,
			"X-Request-Id": requestId,
		},
	});

	// --- Global onRequest hook ---
	let currentReq = req;
	if (options.onRequest) {
		const hooked = await options.onRequest(req);
		if (isApiResponse(hooked)) return withHeaders(hooked);
		currentReq = hooked;
	}

	const method = currentReq.method.toUpperCase();

	const dispatch = async (): Promise<ApiResponse> => {
		for (const r of routes) {
			if (method !== r.method) continue;
			const params = matchRoute(r, currentReq.path);
			if (!params) continue;
			return await r.handler(currentReq, tallybook, params, options);
		}
		return errorResponse(404, "NOT_FOUND", "Route not found");
	};

	let response: ApiResponse;
	try {
		response = await dispatch();
	} catch (error) {
		if (error instanceof LedgerError) {
			response = errorResponse(error.status, error.code, error.message);
		} else {
			const ctx = await tallybook.$context;
			ctx.logger.error("api.unhandled", {
				requestId,
				method,
				path: currentReq.path,
				error: error instanceof Error ? error.message : String(error),
			});
			response = errorResponse(500, "INTERNAL", "Internal server error");
		}
	}

	// --- Global onResponse hook ---
	if (options.onResponse) {
		response = await options.onResponse(currentReq, response);
	}

	return withHeaders(response);
}
