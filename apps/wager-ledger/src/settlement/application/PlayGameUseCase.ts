import {
  InsufficientBalanceError,
  InsufficientCustodyError,
} from '@shared/kernel/DomainError';
import { AccessGate } from '@access/application/AccessGate';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { toRejection } from '@ledger/application/LedgerResult';
import { assertPlayable } from '@games/domain/GameRules';
import { settleWager } from '@settlement/domain/WagerSettlement';
import { PlayGameCommand } from '@settlement/application/commands/PlayGameCommand';
import { PlayGameResult } from '@settlement/application/commands/PlayGameResult';

/**
 * Settles one wager against the caller's balance: the stake is always
 * taken, the fee always accrues, a win is credited from custody.
 */
export class PlayGameUseCase {
  constructor(
    private readonly transactor: LedgerTransactor,
    private readonly gate: AccessGate,
  ) {}

  async execute(cmd: PlayGameCommand): Promise<PlayGameResult> {
    try {
      return await this.transactor.execute('playGame', async (tx) => {
        const { state } = tx;
        this.gate.assertOpen(state);
        const stats = await this.gate.admit(state, cmd.caller);

        const config = state.games.require(cmd.gameType);
        assertPlayable(cmd.gameType, config, cmd.betAmount);

        const available = state.accounts.balanceOf(cmd.caller);
        if (available.isLessThan(cmd.betAmount)) {
          throw new InsufficientBalanceError(
            `Balance ${available} is below bet ${cmd.betAmount}`,
          );
        }

        let balance = state.accounts.debit(cmd.caller, cmd.betAmount);
        const { fee, payout } = settleWager(
          cmd.betAmount,
          cmd.won,
          config.payoutMultiplierBps,
        );

        if (cmd.won) {
          const minter = this.gate.requireMinter(state);
          const custody = await minter.balanceOf(state.engineAddress);
          // Custody has to cover the payout and still back every balance.
          const liabilities = state.accounts.total().add(payout);
          if (custody.isLessThan(liabilities)) {
            throw new InsufficientCustodyError(
              `Custody ${custody} cannot back ${liabilities} after paying ${payout}`,
            );
          }
          balance = state.accounts.credit(cmd.caller, payout);
        }

        state.treasury.accrue(fee);
        state.stats.recordGame(cmd.betAmount, payout);
        await stats.recordGameStat(cmd.won, cmd.betAmount);

        tx.emit({
          type: 'settlement',
          identity: cmd.caller,
          gameType: cmd.gameType,
          betAmount: cmd.betAmount,
          won: cmd.won,
          payout,
          fee,
        });
        return { success: true as const, fee, payout, balance };
      });
    } catch (err) {
      return toRejection(err);
    }
  }
}
