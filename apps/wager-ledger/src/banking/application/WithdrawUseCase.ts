import {
  InsufficientBalanceError,
  InsufficientReserveError,
  NotConvertibleError,
  ZeroAmountError,
} from '@shared/kernel/DomainError';
import { NativeAssetVault } from '@shared/ports/NativeAssetVault';
import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { gameUnitsToNative, isConvertible } from '@banking/domain/PegConversion';
import { WithdrawCommand } from '@banking/application/commands/WithdrawCommand';
import { WithdrawResult } from '@banking/application/commands/WithdrawResult';

export class WithdrawUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
    private readonly vault: NativeAssetVault,
  ) {}

  async execute(cmd: WithdrawCommand): Promise<WithdrawResult> {
    try {
      return await this.transactor.execute('withdraw', async (tx) => {
        const { state } = tx;
        this.gate.assertOpen(state);
        const stats = await this.gate.admit(state, cmd.caller);

        if (cmd.peggedAmount.isZero()) {
          throw new ZeroAmountError('Withdrawal amount must be positive');
        }
        if (!isConvertible(cmd.peggedAmount)) {
          throw new NotConvertibleError(
            `${cmd.peggedAmount} is not a whole number of native units`,
          );
        }
        const minter = this.gate.requireMintingRights(state);

        const available = state.accounts.balanceOf(cmd.caller);
        if (available.isLessThan(cmd.peggedAmount)) {
          throw new InsufficientBalanceError(
            `Balance ${available} is below ${cmd.peggedAmount}`,
          );
        }
        const nativeAmount = gameUnitsToNative(cmd.peggedAmount);
        const reserve = await this.vault.reserve();
        if (reserve.isLessThan(nativeAmount)) {
          throw new InsufficientReserveError(
            `Reserve ${reserve} cannot cover ${nativeAmount}`,
          );
        }

        const balance = state.accounts.debit(cmd.caller, cmd.peggedAmount);

        await minter.burn(state.engineAddress, cmd.peggedAmount);
        tx.onRollback('re-mint burned', () =>
          minter.mint(state.engineAddress, cmd.peggedAmount),
        );

        await this.vault.disburse(cmd.caller, nativeAmount);
        tx.onRollback('reclaim native', () =>
          this.vault.collect(cmd.caller, nativeAmount),
        );

        await stats.recordDepositStat(nativeAmount, false);

        tx.emit({
          type: 'withdrawal',
          identity: cmd.caller,
          peggedAmount: cmd.peggedAmount,
          nativeAmount,
        });
        return { success: true as const, nativeAmount, balance };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
