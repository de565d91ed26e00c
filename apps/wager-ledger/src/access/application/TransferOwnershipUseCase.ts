import { Identity } from '@shared/kernel/Identity';
import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { AdminResult } from '@access/application/commands/AdminResult';

export class TransferOwnershipUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
  ) {}

  async execute(caller: Identity, newOwner: Identity): Promise<AdminResult> {
    try {
      return await this.transactor.execute('transferOwnership', async (tx) => {
        this.gate.assertOwner(tx.state, caller);
        const previous = tx.state.access.transferOwnership(newOwner);
        tx.emit({ type: 'ownership_transferred', previous, current: newOwner });
        return { success: true as const };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
