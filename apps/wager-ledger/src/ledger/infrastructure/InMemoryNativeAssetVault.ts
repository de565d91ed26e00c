import { Injectable } from '@nestjs/common';
import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';
import {
  InsufficientNativeFundsError,
  InsufficientReserveError,
} from '@shared/kernel/DomainError';
import { NativeAssetVault } from '@shared/ports/NativeAssetVault';
import { NativeOnRamp } from '@shared/ports/NativeOnRamp';

/**
 * Native-asset wallets of outside identities plus the ledger's reserve.
 */
@Injectable()
export class InMemoryNativeAssetVault implements NativeAssetVault, NativeOnRamp {
  private readonly wallets: Map<Identity, Amount> = new Map();
  private held: Amount = Amount.zero();

  async reserve(): Promise<Amount> {
    return this.held;
  }

  async collect(from: Identity, amount: Amount): Promise<void> {
    const wallet = this.walletOf(from);
    if (wallet.isLessThan(amount)) {
      throw new InsufficientNativeFundsError(`${from} holds ${wallet}, cannot send ${amount}`);
    }
    this.wallets.set(from, wallet.subtract(amount));
    this.held = this.held.add(amount);
  }

  async disburse(to: Identity, amount: Amount): Promise<void> {
    if (this.held.isLessThan(amount)) {
      throw new InsufficientReserveError(`Reserve ${this.held} cannot cover ${amount}`);
    }
    this.held = this.held.subtract(amount);
    this.wallets.set(to, this.walletOf(to).add(amount));
  }

  /** Credits an outside wallet, e.g. a faucet or an on-ramp. */
  fund(identity: Identity, amount: Amount): void {
    this.wallets.set(identity, this.walletOf(identity).add(amount));
  }

  walletOf(identity: Identity): Amount {
    return this.wallets.get(identity) ?? Amount.zero();
  }
}
