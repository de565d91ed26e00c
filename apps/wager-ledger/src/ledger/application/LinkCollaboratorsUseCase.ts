import { AccessGate } from '@access/application/AccessGate';
import { AdminResult } from '@access/application/commands/AdminResult';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { LinkCollaboratorsCommand } from '@ledger/application/commands/LinkCollaboratorsCommand';

export class LinkCollaboratorsUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
  ) {}

  async execute(cmd: LinkCollaboratorsCommand): Promise<AdminResult> {
    try {
      return await this.transactor.execute('link', async (tx) => {
        this.gate.assertOwner(tx.state, cmd.caller);
        tx.state.link({ minter: cmd.minter, registry: cmd.registry });
        tx.emit({
          type: 'linked',
          minter: cmd.minter?.address ?? null,
          registry: cmd.registry?.address ?? null,
        });
        return { success: true as const };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
