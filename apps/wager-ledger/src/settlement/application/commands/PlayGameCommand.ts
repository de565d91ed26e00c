import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

export interface PlayGameCommand {
  caller: Identity;
  gameType: string;
  betAmount: Amount;
  /**
   * Outcome as reported by the caller. The ledger does not derive or
   * verify it.
   */
  won: boolean;
}
