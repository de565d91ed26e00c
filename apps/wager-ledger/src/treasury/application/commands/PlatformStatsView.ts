import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

export interface PlatformStatsView {
  totalGamesPlayed: Amount;
  totalVolumeWagered: Amount;
  totalPayouts: Amount;
  /** Fees accrued since the last withdrawal. */
  totalFeesCollected: Amount;
  nativeReserve: Amount;
  /** Pegged units the minter holds for the ledger's address. */
  custodyBalance: Amount;
  paused: boolean;
  owner: Identity;
  treasury: Identity | null;
}
