import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

/** Native-asset reserve held by the ledger. */
export interface NativeAssetVault {
  reserve(): Promise<Amount>;
  /** Moves `amount` from `from` into the reserve. */
  collect(from: Identity, amount: Amount): Promise<void>;
  /** Moves `amount` from the reserve to `to`. */
  disburse(to: Identity, amount: Amount): Promise<void>;
}
