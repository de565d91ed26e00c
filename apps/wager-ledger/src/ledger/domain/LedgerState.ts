import { Capability, ALL_CAPABILITIES } from '@shared/kernel/Capability';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Identity } from '@shared/kernel/Identity';
import { PeggedAssetMinter } from '@shared/ports/PeggedAssetMinter';
import { IdentityRegistry } from '@shared/ports/IdentityRegistry';
import { AccountBalanceStore } from '@ledger/domain/AccountBalanceStore';
import { AccessControl } from '@access/domain/AccessControl';
import { GameConfigRegistry } from '@games/domain/GameConfigRegistry';
import { FeeTreasury } from '@treasury/domain/FeeTreasury';
import { PlatformStats } from '@treasury/domain/PlatformStats';

export interface CollaboratorLinks {
  readonly minter: PeggedAssetMinter | null;
  readonly registry: IdentityRegistry | null;
}

export interface InitialLedgerState {
  engineAddress: Identity;
  owner: Identity;
  treasury?: Identity | null;
  games?: Iterable<[string, GameConfig]>;
  links?: CollaboratorLinks;
}

const UNLINKED: CollaboratorLinks = Object.freeze({ minter: null, registry: null });

/**
 * Everything a request may mutate. Requests work on a {@link clone} and
 * the clone replaces the committed state only when the request succeeds.
 */
export class LedgerState {
  private constructor(
    readonly engineAddress: Identity,
    readonly accounts: AccountBalanceStore,
    readonly games: GameConfigRegistry,
    readonly access: AccessControl,
    readonly treasury: FeeTreasury,
    readonly stats: PlatformStats,
    private _links: CollaboratorLinks,
  ) {}

  /**
   * The engine address starts with every capability, so deposits and stat
   * reporting work as soon as collaborators are linked. The owner can
   * revoke them.
   */
  static initial(init: InitialLedgerState): LedgerState {
    const treasury = new FeeTreasury();
    if (init.treasury) treasury.setSink(init.treasury);

    return new LedgerState(
      init.engineAddress,
      new AccountBalanceStore(),
      new GameConfigRegistry(init.games),
      new AccessControl(init.owner, false, [[init.engineAddress, ALL_CAPABILITIES]]),
      treasury,
      new PlatformStats(),
      init.links ?? UNLINKED,
    );
  }

  get links(): CollaboratorLinks {
    return this._links;
  }

  link(links: CollaboratorLinks): void {
    this._links = Object.freeze({ ...links });
  }

  engineHas(capability: Capability): boolean {
    return this.access.hasCapability(this.engineAddress, capability);
  }

  clone(): LedgerState {
    return new LedgerState(
      this.engineAddress,
      this.accounts.clone(),
      this.games.clone(),
      this.access.clone(),
      this.treasury.clone(),
      this.stats.clone(),
      this._links,
    );
  }
}
