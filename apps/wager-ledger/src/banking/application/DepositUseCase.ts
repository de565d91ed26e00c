import { ZeroAmountError } from '@shared/kernel/DomainError';
import { NativeAssetVault } from '@shared/ports/NativeAssetVault';
import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { nativeToGameUnits } from '@banking/domain/PegConversion';
import { DepositCommand } from '@banking/application/commands/DepositCommand';
import { DepositResult } from '@banking/application/commands/DepositResult';

/**
 * Native in, pegged balance out. The pegged units are minted to the
 * ledger's own custody address; the caller only gets an internal credit.
 */
export class DepositUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
    private readonly vault: NativeAssetVault,
  ) {}

  async execute(cmd: DepositCommand): Promise<DepositResult> {
    try {
      return await this.transactor.execute('deposit', async (tx) => {
        const { state } = tx;
        this.gate.assertOpen(state);
        const stats = await this.gate.admit(state, cmd.caller);

        if (cmd.nativeAmount.isZero()) {
          throw new ZeroAmountError('Deposit amount must be positive');
        }
        const minter = this.gate.requireMintingRights(state);
        const peggedAmount = nativeToGameUnits(cmd.nativeAmount);

        await this.vault.collect(cmd.caller, cmd.nativeAmount);
        tx.onRollback('return native', () =>
          this.vault.disburse(cmd.caller, cmd.nativeAmount),
        );

        await minter.mint(state.engineAddress, peggedAmount);
        tx.onRollback('burn minted', () =>
          minter.burn(state.engineAddress, peggedAmount),
        );

        const balance = state.accounts.credit(cmd.caller, peggedAmount);
        await stats.recordDepositStat(cmd.nativeAmount, true);

        tx.emit({
          type: 'deposit',
          identity: cmd.caller,
          nativeAmount: cmd.nativeAmount,
          peggedAmount,
        });
        return { success: true as const, peggedAmount, balance };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
