import { GameConfig } from '@shared/kernel/GameConfig';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';

export class GetGameConfigUseCase {
  constructor(private readonly transactor: LedgerTransactor) {}

  execute(gameType: string): GameConfig | undefined {
    return this.transactor.state.games.get(gameType);
  }

  list(): Array<[string, GameConfig]> {
    return this.transactor.state.games.list();
  }
}
