import type { LedgerClock } from "../types/config.js";

/**
 * Wall clock that never goes backwards: if the system time steps back, the
 * last returned instant is repeated until the wall clock catches up.
 */
export function createMonotonicClock(source: () => number = Date.now): LedgerClock {
	let last = 0;
	return {
		now() {
			const current = source();
			if (current > last) last = current;
			return new Date(last);
		},
	};
}

export interface ManualClock extends LedgerClock {
	advance(ms: number): void;
	set(instant: Date | string): void;
}

/** Clock pinned to one instant, advanced by hand. For tests. */
export function createManualClock(
	start: Date | string = "2024-01-01T00:00:00.000Z",
): ManualClock {
	let current = new Date(start).getTime();
	return {
		now: () => new Date(current),
		advance(ms: number) {
			current += ms;
		},
		set(instant: Date | string) {
			current = new Date(instant).getTime();
		},
	};
}
