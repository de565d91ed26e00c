import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

export interface DepositCommand {
  caller: Identity;
  nativeAmount: Amount;
}
