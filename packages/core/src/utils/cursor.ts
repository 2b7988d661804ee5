import { timingSafeEqual } from "node:crypto";
import type { CursorPayload } from "../types/pagination.js";
import { canonicalJson, hashPayload } from "./hash.js";

/**
 * Encode a statement cursor as `<base64url payload>.<hmac>`.
 * The signature binds the position to its account and rejects forged cursors.
 */
export function encodeCursor(payload: CursorPayload, secret: string): string {
	const body = Buffer.from(canonicalJson(payload)).toString("base64url");
	return `${body}.${hashPayload(body, secret)}`;
}

/** Decode and verify a cursor. Returns null if malformed or badly signed. */
export function decodeCursor(cursor: string, secret: string): CursorPayload | null {
	const dot = cursor.indexOf(".");
	if (dot <= 0) return null;

	const body = cursor.slice(0, dot);
	const signature = Buffer.from(cursor.slice(dot + 1));
	const expected = Buffer.from(hashPayload(body, secret));
	if (signature.length !== expected.length || !timingSafeEqual(signature, expected)) {
		return null;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(Buffer.from(body, "base64url").toString("utf-8"));
	} catch {
		return null;
	}
	if (typeof parsed !== "object" || parsed === null) return null;

	const accountId: unknown = Reflect.get(parsed, "accountId");
	const ts: unknown = Reflect.get(parsed, "ts");
	const id: unknown = Reflect.get(parsed, "id");
	if (typeof accountId !== "string" || typeof ts !== "string" || typeof id !== "string") {
		return null;
	}
	if (Number.isNaN(Date.parse(ts))) return null;
	return { accountId, ts, id };
}
