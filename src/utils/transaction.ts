import { DBError, Model, Transaction, UniqueViolationError } from 'objection';
import { StorageError, isAppError } from '../errors';

/** Postgres SQLSTATEs and driver codes worth a second attempt. */
const TRANSIENT_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '08000',
  '08003',
  '08006', // connection failures
  '57P01', // admin_shutdown
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
]);

/** Driver error code, looking through objection's `DBError` wrapper. */
function errorCode(error: unknown): string | undefined {
  const source = error instanceof DBError ? error.nativeError : error;
  if (typeof source !== 'object' || source === null || !('code' in source)) return undefined;
  const { code } = source;
  return typeof code === 'string' ? code : undefined;
}

export function isTransientStorageError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}

/**
 * Run `work` in a transaction, retrying once if the storage layer reports a
 * transient failure. A second transient failure surfaces as `StorageError`;
 * any other error propagates unchanged.
 */
export async function withTransaction<T>(
  label: string,
  work: (trx: Transaction) => Promise<T>
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await Model.transaction(work);
    } catch (error) {
      if (isAppError(error) || !isTransientStorageError(error)) {
        throw error;
      }
      if (attempt >= 2) {
        console.error(`[storage] ${label} failed after retry:`, error);
        throw new StorageError(`Storage temporarily unavailable (${label})`, error);
      }
      console.warn(`[storage] ${label} hit a transient failure, retrying once`);
    }
  }
}

/** Unique or primary-key violation on either driver. */
export function isUniqueViolation(error: unknown): boolean {
  if (error instanceof UniqueViolationError) return true;
  const code = errorCode(error);
  return (
    code === '23505' ||
    code === 'SQLITE_CONSTRAINT_UNIQUE' ||
    code === 'SQLITE_CONSTRAINT_PRIMARYKEY'
  );
}
