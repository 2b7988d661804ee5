import type { TallybookOptions } from "@tallybook/core";
import { isValidSchemaName, LedgerError } from "@tallybook/core";

function requirePositive(name: string, value: number | undefined, allowZero = false): void {
	if (value === undefined) return;
	const ok = Number.isFinite(value) && (allowZero ? value >= 0 : value > 0);
	if (!ok) {
		throw LedgerError.invalidArgument(
			`Tallybook config: 'advanced.${name}' must be a ${allowZero ? "non-negative" : "positive"} finite number`,
		);
	}
}

/**
 * Validate Tallybook configuration options at runtime.
 * Throws LedgerError (INVALID_ARGUMENT) on invalid configuration.
 */
export function validateConfig(options: TallybookOptions): void {
	if (!options.database) {
		throw LedgerError.invalidArgument("Tallybook config: 'database' adapter is required");
	}

	const adv = options.advanced;
	if (adv) {
		requirePositive("idempotencyTTL", adv.idempotencyTTL, true);
		requirePositive("reservationTimeoutMs", adv.reservationTimeoutMs);
		requirePositive("lockTimeoutMs", adv.lockTimeoutMs);
		requirePositive("maxTransactionAmount", adv.maxTransactionAmount);

		if (adv.maxTransactionAmount !== undefined && !Number.isSafeInteger(adv.maxTransactionAmount)) {
			throw LedgerError.invalidArgument(
				"Tallybook config: 'advanced.maxTransactionAmount' must be a safe integer",
			);
		}

		const maxLimit = adv.statementMaxLimit ?? 200;
		for (const [name, value] of [
			["statementMaxLimit", adv.statementMaxLimit],
			["statementDefaultLimit", adv.statementDefaultLimit],
		] as const) {
			if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
				throw LedgerError.invalidArgument(
					`Tallybook config: 'advanced.${name}' must be a positive integer`,
				);
			}
		}
		if (adv.statementDefaultLimit !== undefined && adv.statementDefaultLimit > maxLimit) {
			throw LedgerError.invalidArgument(
				"Tallybook config: 'advanced.statementDefaultLimit' must not exceed 'advanced.statementMaxLimit'",
			);
		}

		if (adv.cursorSecret !== undefined && adv.cursorSecret.length === 0) {
			throw LedgerError.invalidArgument(
				"Tallybook config: 'advanced.cursorSecret' must be a non-empty string",
			);
		}
	}

	if (options.schema !== undefined && !isValidSchemaName(options.schema)) {
		throw LedgerError.invalidArgument(
			`Tallybook config: 'schema' must be a lowercase identifier (letters, digits, underscores), got "${options.schema}"`,
		);
	}
}

/**
 * Identity function for defining Tallybook configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * export default defineTallybookConfig({
 *   database: memoryAdapter(),
 *   advanced: { idempotencyTTL: 60 * 60 * 1000 },
 * });
 * ```
 */
export function defineTallybookConfig(options: TallybookOptions): TallybookOptions {
	validateConfig(options);
	return options;
}
