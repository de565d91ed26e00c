import { Injectable } from '@nestjs/common';
import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';
import { IdentityRegistry } from '@shared/ports/IdentityRegistry';
import { IdentityEnrollment } from '@shared/ports/IdentityEnrollment';

export interface IdentityStats {
  gamesPlayed: number;
  gamesWon: number;
  totalWagered: Amount;
  totalDeposited: Amount;
  totalWithdrawn: Amount;
}

export interface InMemoryIdentityRegistryOptions {
  address?: Identity;
  /** When false, any identity that is not banned is valid. */
  requireRegistration?: boolean;
}

@Injectable()
export class InMemoryIdentityRegistry implements IdentityRegistry, IdentityEnrollment {
  readonly address: Identity;
  private readonly requireRegistration: boolean;
  private readonly registered = new Set<Identity>();
  private readonly banned = new Set<Identity>();
  private readonly stats = new Map<Identity, IdentityStats>();

  constructor(options: InMemoryIdentityRegistryOptions = {}) {
    this.address = options.address ?? 'identity-registry';
    this.requireRegistration = options.requireRegistration ?? true;
  }

  register(identity: Identity): void {
    this.registered.add(identity);
  }

  ban(identity: Identity): void {
    this.banned.add(identity);
  }

  unban(identity: Identity): void {
    this.banned.delete(identity);
  }

  async isValid(identity: Identity): Promise<boolean> {
    if (this.banned.has(identity)) return false;
    return !this.requireRegistration || this.registered.has(identity);
  }

  async recordGameStat(identity: Identity, won: boolean, amount: Amount): Promise<void> {
    const current = this.statsOf(identity);
    this.stats.set(identity, {
      ...current,
      gamesPlayed: current.gamesPlayed + 1,
      gamesWon: current.gamesWon + (won ? 1 : 0),
      totalWagered: current.totalWagered.add(amount),
    });
  }

  async recordDepositStat(identity: Identity, amount: Amount, isDeposit: boolean): Promise<void> {
    const current = this.statsOf(identity);
    this.stats.set(
      identity,
      isDeposit
        ? { ...current, totalDeposited: current.totalDeposited.add(amount) }
        : { ...current, totalWithdrawn: current.totalWithdrawn.add(amount) },
    );
  }

  statsOf(identity: Identity): IdentityStats {
    return (
      this.stats.get(identity) ?? {
        gamesPlayed: 0,
        gamesWon: 0,
        totalWagered: Amount.zero(),
        totalDeposited: Amount.zero(),
        totalWithdrawn: Amount.zero(),
      }
    );
  }
}
