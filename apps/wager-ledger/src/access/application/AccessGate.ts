import { Amount } from '@shared/kernel/Amount';
import { Capability } from '@shared/kernel/Capability';
import { Identity } from '@shared/kernel/Identity';
import {
  EnginePausedError,
  IneligibleIdentityError,
  MinterNotLinkedError,
  MissingCapabilityError,
  NotOwnerError,
} from '@shared/kernel/DomainError';
import { PeggedAssetMinter } from '@shared/ports/PeggedAssetMinter';
import { IdentityRegistry } from '@shared/ports/IdentityRegistry';
import { LedgerState } from '@ledger/domain/LedgerState';

/**
 * Stat reporting bound to one admitted caller. When no registry is linked
 * the reporter does nothing, so use cases never branch on the link again.
 */
export interface StatReporter {
  recordGameStat(won: boolean, amount: Amount): Promise<void>;
  recordDepositStat(amount: Amount, isDeposit: boolean): Promise<void>;
}

const UNLINKED_REPORTER: StatReporter = {
  recordGameStat: async () => {},
  recordDepositStat: async () => {},
};

function registryReporter(registry: IdentityRegistry, identity: Identity): StatReporter {
  return {
    recordGameStat: (won, amount) => registry.recordGameStat(identity, won, amount),
    recordDepositStat: (amount, isDeposit) =>
      registry.recordDepositStat(identity, amount, isDeposit),
  };
}

/**
 * Entry checks shared by every use case: pause flag, ownership,
 * capabilities and identity validity.
 */
export class AccessGate {
  assertOpen(state: LedgerState): void {
    if (state.access.paused) {
      throw new EnginePausedError('Ledger is paused');
    }
  }

  assertOwner(state: LedgerState, caller: Identity): void {
    if (!state.access.isOwner(caller)) {
      throw new NotOwnerError(`${caller} is not the owner`);
    }
  }

  assertCapability(state: LedgerState, identity: Identity, capability: Capability): void {
    if (!state.access.hasCapability(identity, capability)) {
      throw new MissingCapabilityError(`${identity} lacks ${capability}`);
    }
  }

  /**
   * Checks `caller` against the linked registry, if any, and returns the
   * reporter for its stat deltas. Posting stats is privileged, so the
   * ledger itself must hold GAME_MANAGER.
   */
  async admit(state: LedgerState, caller: Identity): Promise<StatReporter> {
    const { registry } = state.links;
    if (!registry) return UNLINKED_REPORTER;

    this.assertCapability(state, state.engineAddress, Capability.GAME_MANAGER);
    if (!(await registry.isValid(caller))) {
      throw new IneligibleIdentityError(`${caller} is not eligible to transact`);
    }
    return registryReporter(registry, caller);
  }

  requireMinter(state: LedgerState): PeggedAssetMinter {
    const { minter } = state.links;
    if (!minter) {
      throw new MinterNotLinkedError('No pegged-asset minter linked');
    }
    return minter;
  }

  /** Linked minter that the ledger may mint and burn through. */
  requireMintingRights(state: LedgerState): PeggedAssetMinter {
    const minter = this.requireMinter(state);
    this.assertCapability(state, state.engineAddress, Capability.MINTER);
    return minter;
  }
}
