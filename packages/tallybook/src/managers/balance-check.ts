import { LedgerError } from "@tallybook/core";

/**
 * Check that debiting `amount` leaves the balance non-negative.
 *
 * @throws LedgerError.insufficientFunds with the available and required amounts.
 */
export function checkSufficientFunds(params: {
	accountId: string;
	balance: number;
	amount: number;
}): void {
	const { accountId, balance, amount } = params;
	if (balance < amount) {
		throw LedgerError.insufficientFunds(
			`Insufficient funds. Available: ${balance}, Required: ${amount}`,
			{ accountId, available: balance, required: amount },
		);
	}
}

/**
 * Check that crediting `amount` keeps the balance an exact integer.
 */
export function checkCreditWithinRange(params: { balance: number; amount: number }): void {
	if (params.balance + params.amount > Number.MAX_SAFE_INTEGER) {
		throw LedgerError.invalidArgument("Credit would push the balance past the supported range");
	}
}
