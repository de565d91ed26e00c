import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

export interface FundWalletCommand {
  caller: Identity;
  /** Wallet that receives the native asset. */
  identity: Identity;
  nativeAmount: Amount;
}
