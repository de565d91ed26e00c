import { Amount } from '@shared/kernel/Amount';
import { Capability } from '@shared/kernel/Capability';
import { LedgerState } from '@ledger/domain/LedgerState';
import { InMemoryPeggedAssetMinter } from '@ledger/infrastructure/InMemoryPeggedAssetMinter';

describe('LedgerState', () => {
  const init = { engineAddress: 'engine', owner: 'owner-1' };

  it('gives the engine address every capability and nothing to the owner', () => {
    const state = LedgerState.initial(init);
    expect(state.engineHas(Capability.GAME_MANAGER)).toBe(true);
    expect(state.engineHas(Capability.MINTER)).toBe(true);
    expect(state.access.hasCapability('owner-1', Capability.MINTER)).toBe(false);
  });

  it('starts unlinked with no treasury unless one is given', () => {
    const state = LedgerState.initial(init);
    expect(state.links).toEqual({ minter: null, registry: null });
    expect(state.treasury.sink).toBeNull();
    expect(LedgerState.initial({ ...init, treasury: 'treasury-1' }).treasury.sink).toBe(
      'treasury-1',
    );
  });

  it('clones every component', () => {
    const state = LedgerState.initial(init);
    const draft = state.clone();

    draft.accounts.credit('alice', Amount.of(100));
    draft.treasury.accrue(Amount.of(2));
    draft.stats.recordGame(Amount.of(100), Amount.zero());
    draft.access.setPaused(true);
    draft.link({ minter: new InMemoryPeggedAssetMinter(), registry: null });

    expect(state.accounts.balanceOf('alice').isZero()).toBe(true);
    expect(state.treasury.accrued.isZero()).toBe(true);
    expect(state.stats.snapshot().totalGamesPlayed.isZero()).toBe(true);
    expect(state.access.paused).toBe(false);
    expect(state.links.minter).toBeNull();
  });
});
