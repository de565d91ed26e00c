import { IdentityEnrollment } from '@shared/ports/IdentityEnrollment';
import { AccessGate } from '@access/application/AccessGate';
import { AdminResult } from '@access/application/commands/AdminResult';
import { SetIdentityStatusCommand } from '@access/application/commands/SetIdentityStatusCommand';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';

/** Owner-only registration and ban management on the identity registry. */
export class SetIdentityStatusUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
    private readonly enrollment: IdentityEnrollment,
  ) {}

  async execute(cmd: SetIdentityStatusCommand): Promise<AdminResult> {
    try {
      return await this.transactor.execute('setIdentityStatus', async (tx) => {
        this.gate.assertOwner(tx.state, cmd.caller);
        switch (cmd.action) {
          case 'register':
            this.enrollment.register(cmd.identity);
            break;
          case 'ban':
            this.enrollment.ban(cmd.identity);
            break;
          case 'unban':
            this.enrollment.unban(cmd.identity);
            break;
        }
        return { success: true as const };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
