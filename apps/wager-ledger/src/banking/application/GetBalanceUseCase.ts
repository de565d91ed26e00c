import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';

export class GetBalanceUseCase {
  constructor(private readonly transactor: LedgerTransactor) {}

  execute(identity: Identity): Amount {
    return this.transactor.state.accounts.balanceOf(identity);
  }
}
