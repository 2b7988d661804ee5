// =============================================================================
// ROUTE DEFINITIONS
// =============================================================================
// Kept apart from the handler so route modules never import it back.

import { LedgerError } from "@tallybook/core";
import type { Tallybook } from "../tallybook/base.js";
import type { ApiHandlerOptions, ApiRequest, ApiResponse } from "./handler.js";

export type MatchedRouteHandler = (
	req: ApiRequest,
	tallybook: Tallybook,
	params: Record<string, string>,
	options: ApiHandlerOptions,
) => Promise<ApiResponse>;

export interface Route {
	method: string;
	pattern: RegExp;
	paramNames: string[];
	handler: MatchedRouteHandler;
}

export function defineRoute(method: string, path: string, handler: MatchedRouteHandler): Route {
	const paramNames: string[] = [];
	const patternStr = path.replace(/:(\w+)/g, (_, name: string) => {
		paramNames.push(name);
		return "([^/]+)";
	});
	return { method, pattern: new RegExp(`^${patternStr}$`), paramNames, handler };
}

function decodeParam(value: string): string {
	try {
		return decodeURIComponent(value);
	} catch {
		throw LedgerError.invalidArgument(`Malformed path segment "${value}"`);
	}
}

export function matchRoute(route: Route, path: string): Record<string, string> | null {
	const match = route.pattern.exec(path);
	if (!match) return null;
	const params: Record<string, string> = {};
	for (let i = 0; i < route.paramNames.length; i++) {
		const name = route.paramNames[i];
		const value = match[i + 1];
		if (name && value) params[name] = decodeParam(value);
	}
	return params;
}

export function json(status: number, body: unknown): ApiResponse {
	return { status, body, headers: { "Content-Type": "application/json" } };
}

export function errorResponse(status: number, code: string, message: string): ApiResponse {
	return json(status, { error: { code, message } });
}

