/**
 * Result Type Utilities
 *
 * Re-exports of the Result/Either pattern from neverthrow, used where
 * failures are values (configuration) rather than thrown errors.
 */

import {
	Result as NeverthrowResult,
	ok as neverthrowOk,
	err as neverthrowErr,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export const ok = neverthrowOk;
export const err = neverthrowErr;
