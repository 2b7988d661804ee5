import { createHash, createHmac } from "node:crypto";
import stringify from "safe-stable-stringify";

const deterministicStringify = stringify.configure({ deterministic: true });

/**
 * Serialize with sorted keys so logically equal values always produce the
 * same string, whatever their key insertion order.
 */
export function canonicalJson(value: unknown): string {
	const json = deterministicStringify(value);
	if (json === undefined) {
		throw new TypeError("Value is not JSON-serializable");
	}
	return json;
}

/** Compute SHA-256 hash, using HMAC when a secret is provided. */
export function hashPayload(payload: string, secret?: string | null): string {
	if (secret) {
		return createHmac("sha256", secret).update(payload).digest("hex");
	}
	return createHash("sha256").update(payload).digest("hex");
}

/**
 * Fingerprint of the semantically relevant fields of a request.
 *
 * `undefined` fields are folded into `null` so an omitted memo and an explicit
 * `null` memo are the same request.
 */
export function computeFingerprint(fields: Record<string, unknown>): string {
	const normalized: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(fields)) {
		normalized[key] = value === undefined ? null : value;
	}
	return hashPayload(canonicalJson(normalized));
}
