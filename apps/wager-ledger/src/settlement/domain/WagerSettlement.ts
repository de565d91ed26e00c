import { Amount } from '@shared/kernel/Amount';
import { BASIS_POINTS_DENOM, HOUSE_EDGE_BPS } from '@ledger/domain/LedgerConstants';

export interface WagerOutcome {
  fee: Amount;
  payout: Amount;
}

/**
 * Fee is charged on every wager; payout only on a win. Both floor.
 *
 * @example
 * settleWager(Amount.of(100), true, 19_000n)
 * // { fee: 2, payout: 190 }
 */
export function settleWager(
  betAmount: Amount,
  won: boolean,
  payoutMultiplierBps: bigint,
): WagerOutcome {
  const fee = betAmount.mulDiv(HOUSE_EDGE_BPS, BASIS_POINTS_DENOM);
  const payout = won
    ? betAmount.mulDiv(payoutMultiplierBps, BASIS_POINTS_DENOM)
    : Amount.zero();
  return { fee, payout };
}
