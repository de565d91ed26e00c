import { Amount } from '@shared/kernel/Amount';

export interface PlatformCounters {
  readonly totalGamesPlayed: Amount;
  readonly totalVolumeWagered: Amount;
  readonly totalPayouts: Amount;
}

/** Lifetime counters; they never decrease. */
export class PlatformStats {
  private gamesPlayed: Amount;
  private volumeWagered: Amount;
  private payouts: Amount;

  constructor(initial?: PlatformCounters) {
    this.gamesPlayed = initial?.totalGamesPlayed ?? Amount.zero();
    this.volumeWagered = initial?.totalVolumeWagered ?? Amount.zero();
    this.payouts = initial?.totalPayouts ?? Amount.zero();
  }

  recordGame(betAmount: Amount, payout: Amount): void {
    this.gamesPlayed = this.gamesPlayed.add(Amount.of(1));
    this.volumeWagered = this.volumeWagered.add(betAmount);
    this.payouts = this.payouts.add(payout);
  }

  snapshot(): PlatformCounters {
    return {
      totalGamesPlayed: this.gamesPlayed,
      totalVolumeWagered: this.volumeWagered,
      totalPayouts: this.payouts,
    };
  }

  clone(): PlatformStats {
    return new PlatformStats(this.snapshot());
  }
}
