export interface StatementParams {
	/** Page size, 1..200. Default: 50 */
	limit?: number;
	/** Opaque cursor from a previous page */
	cursor?: string | null;
}

export interface StatementPage<T> {
	items: T[];
	/** Resume position after the last item, or null when nothing follows. */
	nextCursor: string | null;
}

/** Position of the last returned entry in `(ts desc, id desc)` order. */
export interface CursorPayload {
	accountId: string;
	/** Entry timestamp, ISO-8601 */
	ts: string;
	/** Entry id */
	id: string;
}
