import { Amount } from '@shared/kernel/Amount';
import { NativeAssetVault } from '@shared/ports/NativeAssetVault';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { PlatformStatsView } from '@treasury/application/commands/PlatformStatsView';

export class GetPlatformStatsUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly vault: NativeAssetVault,
  ) {}

  async execute(): Promise<PlatformStatsView> {
    const state = this.transactor.state;
    const { minter } = state.links;
    const [nativeReserve, custodyBalance] = await Promise.all([
      this.vault.reserve(),
      minter ? minter.balanceOf(state.engineAddress) : Promise.resolve(Amount.zero()),
    ]);

    return {
      ...state.stats.snapshot(),
      totalFeesCollected: state.treasury.accrued,
      nativeReserve,
      custodyBalance,
      paused: state.access.paused,
      owner: state.access.owner,
      treasury: state.treasury.sink,
    };
  }
}
