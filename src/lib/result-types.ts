/**
 * Result Type Utilities
 *
 * Re-exports and utilities for the Result/Either pattern using neverthrow.
 */

import { ok as neverthrowOk, err as neverthrowErr, type Result as NeverthrowResult } from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Extract value from Result or compute default
 *
 * @param fn - Function to compute default value from error
 */
export function unwrapOrElse<T, E>(
	result: Result<T, E>,
	fn: (error: E) => T
): T {
	if (result.isOk()) {
		return result.value;
	}
	return fn(result.error);
}
