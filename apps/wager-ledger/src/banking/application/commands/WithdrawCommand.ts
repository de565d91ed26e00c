import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

export interface WithdrawCommand {
  caller: Identity;
  peggedAmount: Amount;
}
