import { Identity } from '@shared/kernel/Identity';
import {
  InsufficientReserveError,
  NoFeesAccruedError,
  TreasuryNotSetError,
} from '@shared/kernel/DomainError';
import { NativeAssetVault } from '@shared/ports/NativeAssetVault';
import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { WithdrawFeesResult } from '@treasury/application/commands/WithdrawFeesResult';

/**
 * Pays accrued fees to the treasury sink in native units. Callable while
 * paused. Conversion floors, so fewer than 100 accrued units pay out zero
 * native and still reset the counter.
 */
export class WithdrawFeesUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
    private readonly vault: NativeAssetVault,
  ) {}

  async execute(caller: Identity): Promise<WithdrawFeesResult> {
    try {
      return await this.transactor.execute('withdrawFees', async (tx) => {
        const { state } = tx;
        this.gate.assertOwner(state, caller);

        if (state.treasury.accrued.isZero()) {
          throw new NoFeesAccruedError('No fees accrued');
        }
        const sink = state.treasury.sink;
        if (sink === null) {
          throw new TreasuryNotSetError('Treasury sink is not configured');
        }
        const minter = this.gate.requireMinter(state);

        const nativeAmount = minter.gameUnitsToNative(state.treasury.accrued);
        const reserve = await this.vault.reserve();
        if (reserve.isLessThan(nativeAmount)) {
          throw new InsufficientReserveError(
            `Reserve ${reserve} cannot cover fee payout ${nativeAmount}`,
          );
        }

        const amount = state.treasury.drain();
        await this.vault.disburse(sink, nativeAmount);

        tx.emit({ type: 'fee_collected', amount, nativeAmount, treasury: sink });
        return { success: true as const, amount, nativeAmount, treasury: sink };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
