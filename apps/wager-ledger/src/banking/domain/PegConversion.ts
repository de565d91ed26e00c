import { Amount } from '@shared/kernel/Amount';
import { RATIO } from '@ledger/domain/LedgerConstants';

export function nativeToGameUnits(native: Amount): Amount {
  return native.multiply(RATIO);
}

export function gameUnitsToNative(pegged: Amount): Amount {
  return pegged.divide(RATIO);
}

/** Only exact multiples of RATIO convert back without loss. */
export function isConvertible(pegged: Amount): boolean {
  return pegged.isMultipleOf(RATIO);
}
