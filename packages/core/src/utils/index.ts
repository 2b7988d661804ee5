export { createManualClock, createMonotonicClock, type ManualClock } from "./clock.js";
export { decodeCursor, encodeCursor } from "./cursor.js";
export { canonicalJson, computeFingerprint, hashPayload } from "./hash.js";
export { generateId } from "./id.js";
export {
	accountLockKey,
	hashLockKey,
	idempotencyLockKey,
	LOCK_NAMESPACES,
	type LockNamespace,
	orderedAccountLockKeys,
} from "./lock.js";
export { isValidAmount } from "./money.js";
