import { GameConfig } from '@shared/kernel/GameConfig';
import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { Rejection, toRejection } from '@ledger/application/LedgerResult';
import { SetGameConfigCommand } from '@games/application/commands/SetGameConfigCommand';

/**
 * Owner-only, allowed while paused. Stores the tuple as given: a config
 * with `minBet > maxBet` is accepted and simply rejects every bet.
 */
export class SetGameConfigUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
  ) {}

  async execute(
    cmd: SetGameConfigCommand,
  ): Promise<{ success: true; config: GameConfig } | Rejection> {
    try {
      return await this.transactor.execute('setGameConfig', async (tx) => {
        this.gate.assertOwner(tx.state, cmd.caller);

        const config: GameConfig = Object.freeze({
          minBet: cmd.minBet,
          maxBet: cmd.maxBet,
          payoutMultiplierBps: cmd.payoutMultiplierBps,
          isActive: cmd.isActive,
          displayName: cmd.displayName,
        });
        tx.state.games.set(cmd.gameType, config);

        tx.emit({ type: 'config_updated', gameType: cmd.gameType, config });
        return { success: true as const, config };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
