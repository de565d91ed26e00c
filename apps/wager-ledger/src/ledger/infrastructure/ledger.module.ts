import { Module } from '@nestjs/common';
import { LedgerConfigModule } from '@config/config.module';
import {
  LEDGER_SETTINGS,
  INITIAL_GAMES,
  LedgerSettings,
} from '@config/env-config.provider';
import { MessagingModule } from '@messaging/messaging.module';
import { LOGGER, EVENT_PUBLISHER, COMMAND_SUBSCRIBER } from '@messaging/tokens';
import { NatsLedgerEventPublisher } from '@messaging/NatsLedgerEventPublisher';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Logger } from '@shared/ports/Logger';
import { NativeAssetVault } from '@shared/ports/NativeAssetVault';
import { LedgerState } from '@ledger/domain/LedgerState';
import { LedgerTransactor } from '@ledger/application/LedgerTransactor';
import { CommandSubscriber } from '@ledger/application/ports/CommandSubscriber';
import { LinkCollaboratorsUseCase } from '@ledger/application/LinkCollaboratorsUseCase';
import {
  LedgerUseCases,
  ServeLedgerCommandsUseCase,
} from '@ledger/application/ServeLedgerCommandsUseCase';
import { AccessGate } from '@access/application/AccessGate';
import { SetCapabilityUseCase } from '@access/application/SetCapabilityUseCase';
import { SetPausedUseCase } from '@access/application/SetPausedUseCase';
import { SetIdentityStatusUseCase } from '@access/application/SetIdentityStatusUseCase';
import { TransferOwnershipUseCase } from '@access/application/TransferOwnershipUseCase';
import { SetGameConfigUseCase } from '@games/application/SetGameConfigUseCase';
import { GetGameConfigUseCase } from '@games/application/GetGameConfigUseCase';
import { DepositUseCase } from '@banking/application/DepositUseCase';
import { WithdrawUseCase } from '@banking/application/WithdrawUseCase';
import { FundWalletUseCase } from '@banking/application/FundWalletUseCase';
import { GetBalanceUseCase } from '@banking/application/GetBalanceUseCase';
import { PlayGameUseCase } from '@settlement/application/PlayGameUseCase';
import { WithdrawFeesUseCase } from '@treasury/application/WithdrawFeesUseCase';
import { SetTreasuryUseCase } from '@treasury/application/SetTreasuryUseCase';
import { GetPlatformStatsUseCase } from '@treasury/application/GetPlatformStatsUseCase';
import { InMemoryPeggedAssetMinter } from './InMemoryPeggedAssetMinter';
import { InMemoryIdentityRegistry } from './InMemoryIdentityRegistry';
import { InMemoryNativeAssetVault } from './InMemoryNativeAssetVault';
import { InMemoryLedgerEventLog } from './InMemoryLedgerEventLog';
import { FanOutLedgerEventPublisher } from './FanOutLedgerEventPublisher';

export const PEGGED_MINTER = 'PeggedAssetMinter';
export const IDENTITY_REGISTRY = 'IdentityRegistry';
export const NATIVE_VAULT = 'NativeAssetVault';
export const LEDGER_EVENT_LOG = 'LedgerEventLog';
export const ACCESS_GATE = 'AccessGate';
export const LEDGER_TRANSACTOR = 'LedgerTransactor';
export const DEPOSIT_USE_CASE = 'DepositUseCase';
export const WITHDRAW_USE_CASE = 'WithdrawUseCase';
export const GET_BALANCE_USE_CASE = 'GetBalanceUseCase';
export const PLAY_GAME_USE_CASE = 'PlayGameUseCase';
export const SET_GAME_CONFIG_USE_CASE = 'SetGameConfigUseCase';
export const GET_GAME_CONFIG_USE_CASE = 'GetGameConfigUseCase';
export const SET_CAPABILITY_USE_CASE = 'SetCapabilityUseCase';
export const SET_PAUSED_USE_CASE = 'SetPausedUseCase';
export const TRANSFER_OWNERSHIP_USE_CASE = 'TransferOwnershipUseCase';
export const LINK_COLLABORATORS_USE_CASE = 'LinkCollaboratorsUseCase';
export const WITHDRAW_FEES_USE_CASE = 'WithdrawFeesUseCase';
export const SET_TREASURY_USE_CASE = 'SetTreasuryUseCase';
export const GET_PLATFORM_STATS_USE_CASE = 'GetPlatformStatsUseCase';
export const FUND_WALLET_USE_CASE = 'FundWalletUseCase';
export const SET_IDENTITY_STATUS_USE_CASE = 'SetIdentityStatusUseCase';
export const SERVE_LEDGER_COMMANDS_USE_CASE = 'ServeLedgerCommandsUseCase';

@Module({
  imports: [LedgerConfigModule, MessagingModule],
  providers: [
    // ── Port → Implementation mappings ──────────────────
    {
      provide: PEGGED_MINTER,
      useFactory: (): InMemoryPeggedAssetMinter => new InMemoryPeggedAssetMinter(),
    },
    {
      provide: IDENTITY_REGISTRY,
      useFactory: (settings: LedgerSettings): InMemoryIdentityRegistry =>
        new InMemoryIdentityRegistry({
          requireRegistration: settings.requireRegistration,
        }),
      inject: [LEDGER_SETTINGS],
    },
    {
      provide: NATIVE_VAULT,
      useFactory: (): InMemoryNativeAssetVault => new InMemoryNativeAssetVault(),
    },
    {
      provide: LEDGER_EVENT_LOG,
      useFactory: (): InMemoryLedgerEventLog => new InMemoryLedgerEventLog(),
    },
    {
      provide: ACCESS_GATE,
      useFactory: (): AccessGate => new AccessGate(),
    },
    {
      provide: LEDGER_TRANSACTOR,
      useFactory: (
        settings: LedgerSettings,
        games: Array<[string, GameConfig]>,
        eventLog: InMemoryLedgerEventLog,
        natsPublisher: NatsLedgerEventPublisher,
        logger: Logger,
      ): LedgerTransactor =>
        new LedgerTransactor(
          LedgerState.initial({
            engineAddress: settings.engineAddress,
            owner: settings.ownerId,
            treasury: settings.treasuryId,
            games,
          }),
          new FanOutLedgerEventPublisher([eventLog, natsPublisher]),
          logger,
        ),
      inject: [LEDGER_SETTINGS, INITIAL_GAMES, LEDGER_EVENT_LOG, EVENT_PUBLISHER, LOGGER],
    },

    // ── Use cases ───────────────────────────────────────
    {
      provide: DEPOSIT_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        gate: AccessGate,
        vault: NativeAssetVault,
      ): DepositUseCase => new DepositUseCase(transactor, gate, vault),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE, NATIVE_VAULT],
    },
    {
      provide: WITHDRAW_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        gate: AccessGate,
        vault: NativeAssetVault,
      ): WithdrawUseCase => new WithdrawUseCase(transactor, gate, vault),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE, NATIVE_VAULT],
    },
    {
      provide: GET_BALANCE_USE_CASE,
      useFactory: (transactor: LedgerTransactor): GetBalanceUseCase =>
        new GetBalanceUseCase(transactor),
      inject: [LEDGER_TRANSACTOR],
    },
    {
      provide: PLAY_GAME_USE_CASE,
      useFactory: (transactor: LedgerTransactor, gate: AccessGate): PlayGameUseCase =>
        new PlayGameUseCase(transactor, gate),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE],
    },
    {
      provide: SET_GAME_CONFIG_USE_CASE,
      useFactory: (transactor: LedgerTransactor, gate: AccessGate): SetGameConfigUseCase =>
        new SetGameConfigUseCase(transactor, gate),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE],
    },
    {
      provide: GET_GAME_CONFIG_USE_CASE,
      useFactory: (transactor: LedgerTransactor): GetGameConfigUseCase =>
        new GetGameConfigUseCase(transactor),
      inject: [LEDGER_TRANSACTOR],
    },
    {
      provide: SET_CAPABILITY_USE_CASE,
      useFactory: (transactor: LedgerTransactor, gate: AccessGate): SetCapabilityUseCase =>
        new SetCapabilityUseCase(transactor, gate),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE],
    },
    {
      provide: SET_PAUSED_USE_CASE,
      useFactory: (transactor: LedgerTransactor, gate: AccessGate): SetPausedUseCase =>
        new SetPausedUseCase(transactor, gate),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE],
    },
    {
      provide: TRANSFER_OWNERSHIP_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        gate: AccessGate,
      ): TransferOwnershipUseCase => new TransferOwnershipUseCase(transactor, gate),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE],
    },
    {
      provide: LINK_COLLABORATORS_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        gate: AccessGate,
      ): LinkCollaboratorsUseCase => new LinkCollaboratorsUseCase(transactor, gate),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE],
    },
    {
      provide: WITHDRAW_FEES_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        gate: AccessGate,
        vault: NativeAssetVault,
      ): WithdrawFeesUseCase => new WithdrawFeesUseCase(transactor, gate, vault),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE, NATIVE_VAULT],
    },
    {
      provide: SET_TREASURY_USE_CASE,
      useFactory: (transactor: LedgerTransactor, gate: AccessGate): SetTreasuryUseCase =>
        new SetTreasuryUseCase(transactor, gate),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE],
    },
    {
      provide: GET_PLATFORM_STATS_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        vault: NativeAssetVault,
      ): GetPlatformStatsUseCase => new GetPlatformStatsUseCase(transactor, vault),
      inject: [LEDGER_TRANSACTOR, NATIVE_VAULT],
    },
    {
      provide: FUND_WALLET_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        gate: AccessGate,
        vault: InMemoryNativeAssetVault,
      ): FundWalletUseCase => new FundWalletUseCase(transactor, gate, vault),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE, NATIVE_VAULT],
    },
    {
      provide: SET_IDENTITY_STATUS_USE_CASE,
      useFactory: (
        transactor: LedgerTransactor,
        gate: AccessGate,
        registry: InMemoryIdentityRegistry,
      ): SetIdentityStatusUseCase => new SetIdentityStatusUseCase(transactor, gate, registry),
      inject: [LEDGER_TRANSACTOR, ACCESS_GATE, IDENTITY_REGISTRY],
    },
    {
      provide: SERVE_LEDGER_COMMANDS_USE_CASE,
      useFactory: (
        subscriber: CommandSubscriber,
        notifier: NatsLedgerEventPublisher,
        logger: Logger,
        deposit: DepositUseCase,
        withdraw: WithdrawUseCase,
        fundWallet: FundWalletUseCase,
        getBalance: GetBalanceUseCase,
        playGame: PlayGameUseCase,
        setGameConfig: SetGameConfigUseCase,
        getGameConfig: GetGameConfigUseCase,
        setCapability: SetCapabilityUseCase,
        setIdentityStatus: SetIdentityStatusUseCase,
        setPaused: SetPausedUseCase,
        transferOwnership: TransferOwnershipUseCase,
        setTreasury: SetTreasuryUseCase,
        withdrawFees: WithdrawFeesUseCase,
        getPlatformStats: GetPlatformStatsUseCase,
      ): ServeLedgerCommandsUseCase => {
        const useCases: LedgerUseCases = {
          deposit,
          withdraw,
          fundWallet,
          getBalance,
          playGame,
          setGameConfig,
          getGameConfig,
          setCapability,
          setIdentityStatus,
          setPaused,
          transferOwnership,
          setTreasury,
          withdrawFees,
          getPlatformStats,
        };
        return new ServeLedgerCommandsUseCase(subscriber, useCases, notifier, logger);
      },
      inject: [
        COMMAND_SUBSCRIBER,
        EVENT_PUBLISHER,
        LOGGER,
        DEPOSIT_USE_CASE,
        WITHDRAW_USE_CASE,
        FUND_WALLET_USE_CASE,
        GET_BALANCE_USE_CASE,
        PLAY_GAME_USE_CASE,
        SET_GAME_CONFIG_USE_CASE,
        GET_GAME_CONFIG_USE_CASE,
        SET_CAPABILITY_USE_CASE,
        SET_IDENTITY_STATUS_USE_CASE,
        SET_PAUSED_USE_CASE,
        TRANSFER_OWNERSHIP_USE_CASE,
        SET_TREASURY_USE_CASE,
        WITHDRAW_FEES_USE_CASE,
        GET_PLATFORM_STATS_USE_CASE,
      ],
    },
  ],
  exports: [
    PEGGED_MINTER,
    IDENTITY_REGISTRY,
    NATIVE_VAULT,
    LEDGER_EVENT_LOG,
    LEDGER_TRANSACTOR,
    DEPOSIT_USE_CASE,
    WITHDRAW_USE_CASE,
    GET_BALANCE_USE_CASE,
    PLAY_GAME_USE_CASE,
    SET_GAME_CONFIG_USE_CASE,
    GET_GAME_CONFIG_USE_CASE,
    SET_CAPABILITY_USE_CASE,
    SET_PAUSED_USE_CASE,
    TRANSFER_OWNERSHIP_USE_CASE,
    LINK_COLLABORATORS_USE_CASE,
    WITHDRAW_FEES_USE_CASE,
    SET_TREASURY_USE_CASE,
    GET_PLATFORM_STATS_USE_CASE,
    FUND_WALLET_USE_CASE,
    SET_IDENTITY_STATUS_USE_CASE,
    SERVE_LEDGER_COMMANDS_USE_CASE,
  ],
})
export class LedgerModule {}
