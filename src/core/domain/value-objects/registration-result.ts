/**
 * Registration Result
 *
 * Outcome of a registration attempt that distinguishes a rejected record
 * from a storage failure.
 */

import type { UserRecord } from "../entities/user-record.js";
import type { StorageError, ValidationError } from "../errors/index.js";

export type RegistrationFailure = ValidationError | StorageError;

export type RegistrationResult =
  | { readonly ok: true; readonly record: UserRecord }
  | { readonly ok: false; readonly error: RegistrationFailure };

export function registered(record: UserRecord): RegistrationResult {
  return { ok: true, record };
}

export function rejected(error: RegistrationFailure): RegistrationResult {
  return { ok: false, error };
}
