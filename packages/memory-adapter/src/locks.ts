// =============================================================================
// KEYED LOCKS: In-process stand-in for pg_advisory_xact_lock
// =============================================================================
// A lock belongs to an owner (one per transaction), is reentrant for that
// owner, and is handed to waiters in FIFO order when the owner releases.
// Keys carry their namespace, so account and idempotency locks never collide.

import type { LockNamespace } from "@tallybook/core";
import { LedgerError } from "@tallybook/core";

interface Waiter {
	owner: symbol;
	grant: () => void;
}

interface HeldLock {
	owner: symbol;
	waiters: Waiter[];
}

export class KeyedLockManager {
	private readonly held = new Map<string, HeldLock>();

	constructor(private readonly timeoutMs: () => number) {}

	async acquire(namespace: LockNamespace, lockKey: number, owner: symbol): Promise<void> {
		const key = `${namespace}:${lockKey}`;
		const current = this.held.get(key);
		if (!current) {
			this.held.set(key, { owner, waiters: [] });
			return;
		}
		if (current.owner === owner) return;

		await new Promise<void>((resolve, reject) => {
			const timer = setTimeout(() => {
				const index = current.waiters.indexOf(waiter);
				if (index !== -1) current.waiters.splice(index, 1);
				reject(LedgerError.unavailable(`Lock wait timeout exceeded for key ${key}`));
			}, this.timeoutMs());
			const waiter: Waiter = {
				owner,
				grant: () => {
					clearTimeout(timer);
					resolve();
				},
			};
			current.waiters.push(waiter);
		});
	}

	/** Release every lock held by `owner`. */
	releaseAll(owner: symbol): void {
		for (const [key, lock] of this.held) {
			if (lock.owner !== owner) continue;
			const next = lock.waiters.shift();
			if (next) {
				lock.owner = next.owner;
				next.grant();
			} else {
				this.held.delete(key);
			}
		}
	}
}
