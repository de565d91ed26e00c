import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

export interface IdentityRegistry {
  readonly address: Identity;
  isValid(identity: Identity): Promise<boolean>;
  recordGameStat(identity: Identity, won: boolean, amount: Amount): Promise<void>;
  recordDepositStat(identity: Identity, amount: Amount, isDeposit: boolean): Promise<void>;
}
