import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

export interface SetGameConfigCommand {
  caller: Identity;
  gameType: string;
  minBet: Amount;
  maxBet: Amount;
  payoutMultiplierBps: bigint;
  isActive: boolean;
  displayName: string;
}
