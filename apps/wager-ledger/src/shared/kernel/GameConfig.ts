import { Amount } from '@shared/kernel/Amount';

/**
 * Parameters of one game type. `minBet <= maxBet` is not enforced here;
 * a reversed pair makes the game type unplayable.
 */
export interface GameConfig {
  readonly minBet: Amount;
  readonly maxBet: Amount;
  /** 10000 = 1.0x */
  readonly payoutMultiplierBps: bigint;
  readonly isActive: boolean;
  readonly displayName: string;
}
