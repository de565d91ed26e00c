import { Identity } from '@shared/kernel/Identity';
import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { AdminResult } from '@access/application/commands/AdminResult';

/**
 * `pause` and `unpause`. Takes effect for the next admitted request; there
 * is no drain period.
 */
export class SetPausedUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
  ) {}

  async execute(caller: Identity, paused: boolean): Promise<AdminResult> {
    try {
      return await this.transactor.execute(paused ? 'pause' : 'unpause', async (tx) => {
        this.gate.assertOwner(tx.state, caller);
        tx.state.access.setPaused(paused);
        tx.emit(paused ? { type: 'paused', by: caller } : { type: 'unpaused', by: caller });
        return { success: true as const };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
