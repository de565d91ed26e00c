import { LedgerError, LedgerErrorCode } from '@shared/kernel/DomainError';

export type Rejection = { success: false; error: LedgerErrorCode };

/**
 * Turns a ledger failure into the caller-facing rejection. Anything that
 * is not a {@link LedgerError} is rethrown.
 */
export function toRejection(err: unknown): Rejection {
  if (err instanceof LedgerError) {
    return { success: false, error: err.code };
  }
  throw err;
}
