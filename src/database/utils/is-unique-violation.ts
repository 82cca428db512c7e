import { QueryFailedError } from 'typeorm';

// SQLSTATE unique_violation
export const UNIQUE_VIOLATION = '23505';

/**
 * True when a write failed on a unique index, e.g. a concurrent insert of
 * the same login that passed the existence check first.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}
