import { Identity } from '@shared/kernel/Identity';
import { Logger } from '@shared/ports/Logger';
import { DepositUseCase } from '@banking/application/DepositUseCase';
import { WithdrawUseCase } from '@banking/application/WithdrawUseCase';
import { FundWalletUseCase } from '@banking/application/FundWalletUseCase';
import { GetBalanceUseCase } from '@banking/application/GetBalanceUseCase';
import { PlayGameUseCase } from '@settlement/application/PlayGameUseCase';
import { SetGameConfigUseCase } from '@games/application/SetGameConfigUseCase';
import { GetGameConfigUseCase } from '@games/application/GetGameConfigUseCase';
import { SetCapabilityUseCase } from '@access/application/SetCapabilityUseCase';
import { SetIdentityStatusUseCase } from '@access/application/SetIdentityStatusUseCase';
import { SetPausedUseCase } from '@access/application/SetPausedUseCase';
import { TransferOwnershipUseCase } from '@access/application/TransferOwnershipUseCase';
import { SetTreasuryUseCase } from '@treasury/application/SetTreasuryUseCase';
import { WithdrawFeesUseCase } from '@treasury/application/WithdrawFeesUseCase';
import { GetPlatformStatsUseCase } from '@treasury/application/GetPlatformStatsUseCase';
import {
  CommandSubscriber,
  LedgerCommandMap,
  LedgerCommandName,
} from '@ledger/application/ports/CommandSubscriber';
import { RequestRejectedNotifier } from '@ledger/application/ports/RequestRejectedNotifier';
import { Rejection } from '@ledger/application/LedgerResult';
import { PromiseTracker } from '@ledger/application/PromiseTracker';

export interface LedgerUseCases {
  deposit: DepositUseCase;
  withdraw: WithdrawUseCase;
  fundWallet: FundWalletUseCase;
  getBalance: GetBalanceUseCase;
  playGame: PlayGameUseCase;
  setGameConfig: SetGameConfigUseCase;
  getGameConfig: GetGameConfigUseCase;
  setCapability: SetCapabilityUseCase;
  setIdentityStatus: SetIdentityStatusUseCase;
  setPaused: SetPausedUseCase;
  transferOwnership: TransferOwnershipUseCase;
  setTreasury: SetTreasuryUseCase;
  withdrawFees: WithdrawFeesUseCase;
  getPlatformStats: GetPlatformStatsUseCase;
}

type CommandOutcome = { success: true } | Rejection;

/**
 * Routes inbound commands to their use cases and answers queries. Each
 * command becomes one ledger request; rejections are announced back to
 * callers under the command's name.
 */
export class ServeLedgerCommandsUseCase {
  private running = false;
  private readonly requests: PromiseTracker;

  constructor(
    private readonly subscriber: CommandSubscriber,
    private readonly useCases: LedgerUseCases,
    private readonly notifier: RequestRejectedNotifier,
    private readonly logger: Logger,
    pendingHighWaterMark: number = 1_000,
  ) {
    this.requests = new PromiseTracker('ledger requests', pendingHighWaterMark, logger);
  }

  start(): void {
    if (this.running) throw new Error('Command router is already running');
    this.running = true;
    const uc = this.useCases;

    this.route('deposit', (cmd) => uc.deposit.execute(cmd));
    this.route('withdraw', (cmd) => uc.withdraw.execute(cmd));
    this.route('playGame', (cmd) => uc.playGame.execute(cmd));
    this.route('fundWallet', (cmd) => uc.fundWallet.execute(cmd));
    this.route('setIdentityStatus', (cmd) => uc.setIdentityStatus.execute(cmd));
    this.route('setGameConfig', (cmd) => uc.setGameConfig.execute(cmd));
    this.route('setCapability', (cmd) => uc.setCapability.execute(cmd));
    this.route('setPaused', (cmd) => uc.setPaused.execute(cmd.caller, cmd.paused));
    this.route('transferOwnership', (cmd) =>
      uc.transferOwnership.execute(cmd.caller, cmd.newOwner),
    );
    this.route('setTreasury', (cmd) => uc.setTreasury.execute(cmd));
    this.route('withdrawFees', (cmd) => uc.withdrawFees.execute(cmd.caller));

    this.subscriber.onQuery('balance', async ({ identity }) => ({
      identity,
      balance: uc.getBalance.execute(identity),
    }));
    this.subscriber.onQuery('gameConfig', async ({ gameType }) => {
      if (gameType === undefined) {
        return {
          games: uc.getGameConfig.list().map(([type, config]) => ({ gameType: type, config })),
        };
      }
      return { gameType, config: uc.getGameConfig.execute(gameType) ?? null };
    });
    this.subscriber.onQuery('stats', () => uc.getPlatformStats.execute());
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.subscriber.close();
    await this.requests.drain();
  }

  get pending(): number {
    return this.requests.size;
  }

  private route<K extends LedgerCommandName>(
    command: K,
    run: (cmd: LedgerCommandMap[K]) => Promise<CommandOutcome>,
  ): void {
    this.subscriber.onCommand(command, (cmd) => {
      this.dispatch(command, cmd.caller, () => run(cmd));
    });
  }

  private dispatch(
    operation: LedgerCommandName,
    caller: Identity,
    request: () => Promise<CommandOutcome>,
  ): void {
    if (!this.running) return;

    const handled = request()
      .then(async (result) => {
        if (!result.success) {
          await this.notifier.requestRejected(caller, operation, result.error);
        }
      })
      .catch((err: unknown) => {
        this.logger.error('Ledger command failed', {
          operation,
          caller,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    this.requests.track(handled);
  }
}
