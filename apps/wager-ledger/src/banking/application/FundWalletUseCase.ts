import { ZeroAmountError } from '@shared/kernel/DomainError';
import { NativeOnRamp } from '@shared/ports/NativeOnRamp';
import { AccessGate } from '@access/application/AccessGate';
import { AdminResult } from '@access/application/commands/AdminResult';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { FundWalletCommand } from '@banking/application/commands/FundWalletCommand';

/**
 * Owner-only. Credits an outside native wallet so its holder can deposit.
 * Runs through the transactor so it is ordered with the deposits that
 * follow it; the ledger's own state is not touched.
 */
export class FundWalletUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
    private readonly onRamp: NativeOnRamp,
  ) {}

  async execute(cmd: FundWalletCommand): Promise<AdminResult> {
    try {
      return await this.transactor.execute('fundWallet', async (tx) => {
        this.gate.assertOwner(tx.state, cmd.caller);
        if (cmd.nativeAmount.isZero()) {
          throw new ZeroAmountError('Funding amount must be positive');
        }
        this.onRamp.fund(cmd.identity, cmd.nativeAmount);
        return { success: true as const };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
