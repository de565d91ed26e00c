import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

/**
 * Issues and destroys pegged-asset units. The ledger mints into its own
 * custody address, never to end users.
 */
export interface PeggedAssetMinter {
  readonly address: Identity;
  mint(holder: Identity, amount: Amount): Promise<void>;
  burn(holder: Identity, amount: Amount): Promise<void>;
  balanceOf(holder: Identity): Promise<Amount>;
  /** Exact scale-by-100. */
  nativeToGameUnits(amount: Amount): Amount;
  /** Floor division by 100. */
  gameUnitsToNative(amount: Amount): Amount;
}
