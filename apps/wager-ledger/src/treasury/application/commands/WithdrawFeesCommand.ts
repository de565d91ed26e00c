import { Identity } from '@shared/kernel/Identity';

export interface WithdrawFeesCommand {
  caller: Identity;
}
