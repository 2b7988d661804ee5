/** Whether `amount` is a usable ledger amount: a safe integer in 1..max. */
export function isValidAmount(amount: unknown, max: number): amount is number {
	return (
		typeof amount === "number" && Number.isSafeInteger(amount) && amount > 0 && amount <= max
	);
}
