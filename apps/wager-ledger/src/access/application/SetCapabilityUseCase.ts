import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { SetCapabilityCommand } from '@access/application/commands/SetCapabilityCommand';
import { AdminResult } from '@access/application/commands/AdminResult';

/** `authorize` and `revoke`. Owner-only. */
export class SetCapabilityUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
  ) {}

  async execute(cmd: SetCapabilityCommand): Promise<AdminResult> {
    const operation = cmd.granted ? 'authorize' : 'revoke';
    try {
      return await this.transactor.execute(operation, async (tx) => {
        this.gate.assertOwner(tx.state, cmd.caller);

        if (cmd.granted) {
          tx.state.access.grant(cmd.capability, cmd.identity);
          tx.emit({ type: 'capability_granted', capability: cmd.capability, identity: cmd.identity });
        } else {
          tx.state.access.revoke(cmd.capability, cmd.identity);
          tx.emit({ type: 'capability_revoked', capability: cmd.capability, identity: cmd.identity });
        }
        return { success: true as const };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
