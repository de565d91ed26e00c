import { DepositCommand } from '@banking/application/commands/DepositCommand';
import { WithdrawCommand } from '@banking/application/commands/WithdrawCommand';
import { FundWalletCommand } from '@banking/application/commands/FundWalletCommand';
import { PlayGameCommand } from '@settlement/application/commands/PlayGameCommand';
import { SetGameConfigCommand } from '@games/application/commands/SetGameConfigCommand';
import { SetCapabilityCommand } from '@access/application/commands/SetCapabilityCommand';
import { SetIdentityStatusCommand } from '@access/application/commands/SetIdentityStatusCommand';
import { SetPausedCommand } from '@access/application/commands/SetPausedCommand';
import { TransferOwnershipCommand } from '@access/application/commands/TransferOwnershipCommand';
import { SetTreasuryCommand } from '@treasury/application/commands/SetTreasuryCommand';
import { WithdrawFeesCommand } from '@treasury/application/commands/WithdrawFeesCommand';
import { PlatformStatsView } from '@treasury/application/commands/PlatformStatsView';
import {
  BalanceQuery,
  BalanceView,
  GameConfigQuery,
  GameConfigView,
  StatsQuery,
} from '@ledger/application/queries/LedgerQueries';

/** Fire-and-forget commands, keyed by the operation they request. */
export interface LedgerCommandMap {
  deposit: DepositCommand;
  withdraw: WithdrawCommand;
  playGame: PlayGameCommand;
  fundWallet: FundWalletCommand;
  setIdentityStatus: SetIdentityStatusCommand;
  setGameConfig: SetGameConfigCommand;
  setCapability: SetCapabilityCommand;
  setPaused: SetPausedCommand;
  transferOwnership: TransferOwnershipCommand;
  setTreasury: SetTreasuryCommand;
  withdrawFees: WithdrawFeesCommand;
}

export type LedgerCommandName = keyof LedgerCommandMap;

/** Read-only request/reply queries. */
export interface LedgerQueryMap {
  balance: { request: BalanceQuery; response: BalanceView };
  gameConfig: { request: GameConfigQuery; response: GameConfigView };
  stats: { request: StatsQuery; response: PlatformStatsView };
}

export type LedgerQueryName = keyof LedgerQueryMap;

export type CommandHandler<K extends LedgerCommandName> = (cmd: LedgerCommandMap[K]) => void;

export type QueryHandler<K extends LedgerQueryName> = (
  request: LedgerQueryMap[K]['request'],
) => Promise<LedgerQueryMap[K]['response']>;

/**
 * Inbound side of the transport. Payloads reach handlers already
 * validated; `caller` is whatever the transport authenticated.
 */
export interface CommandSubscriber {
  onCommand<K extends LedgerCommandName>(command: K, handler: CommandHandler<K>): void;
  onQuery<K extends LedgerQueryName>(query: K, handler: QueryHandler<K>): void;
  close(): Promise<void>;
}
