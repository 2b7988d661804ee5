export interface Account {
	id: string;
	ownerName: string;
	/** Balance in minor units. Never negative. */
	balance: number;
	/** ISO-8601 UTC */
	createdAt: string;
}
