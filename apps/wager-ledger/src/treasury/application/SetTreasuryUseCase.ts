import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { Rejection, toRejection } from '@ledger/application/LedgerResult';
import { SetTreasuryCommand } from '@treasury/application/commands/SetTreasuryCommand';

export class SetTreasuryUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
  ) {}

  async execute(cmd: SetTreasuryCommand): Promise<{ success: true } | Rejection> {
    try {
      return await this.transactor.execute('setTreasury', async (tx) => {
        this.gate.assertOwner(tx.state, cmd.caller);
        const previous = tx.state.treasury.setSink(cmd.treasury);
        tx.emit({ type: 'treasury_updated', previous, current: cmd.treasury });
        return { success: true as const };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
