import { Test, TestingModule } from '@nestjs/testing';
import { AppModule } from '../../src/app.module';
import { Amount } from '@shared/kernel/Amount';
import { RawLedgerConfig } from '@config/ledger-config.schema';
import { VALIDATED_ENV, INITIAL_GAMES } from '@config/env-config.provider';
import { NATS_CONNECTION, LEDGER_TOPICS, LOGGER } from '@messaging/tokens';
import {
  GET_BALANCE_USE_CASE,
  GET_PLATFORM_STATS_USE_CASE,
  PEGGED_MINTER,
} from '@ledger/infrastructure/ledger.module';
import { InMemoryPeggedAssetMinter } from '@ledger/infrastructure/InMemoryPeggedAssetMinter';
import { GetBalanceUseCase } from '@banking/application/GetBalanceUseCase';
import { GetPlatformStatsUseCase } from '@treasury/application/GetPlatformStatsUseCase';
import { MockNatsConnection } from './helpers/mock-nats';
import {
  ALICE,
  BOB,
  COIN_FLIP,
  ENGINE,
  OWNER,
  TEST_TOPICS,
  TREASURY,
  flushPromises,
  mockLogger,
} from './helpers/test-ledger';

const TEST_RAW_CONFIG: RawLedgerConfig = {
  LEDGER_ID: 'test-ledger',
  OWNER_ID: OWNER,
  ENGINE_ADDRESS: ENGINE,
  TREASURY_ID: TREASURY,
  GAMES_FILE: 'config/games.json',
  NATS_URL: 'nats://localhost:4222',
  REQUIRE_REGISTRATION: false,
};

/**
 * Boots the whole application with only NATS, logging and configuration
 * replaced, then drives it through inbound commands.
 */
describe('Ledger command flow E2E', () => {
  let module: TestingModule;
  let mockNats: MockNatsConnection;
  let logger: ReturnType<typeof mockLogger>;

  beforeAll(async () => {
    mockNats = new MockNatsConnection();
    logger = mockLogger();

    module = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(NATS_CONNECTION).useValue(mockNats)
      .overrideProvider(VALIDATED_ENV).useValue(TEST_RAW_CONFIG)
      .overrideProvider(INITIAL_GAMES).useValue([['coin-flip', COIN_FLIP]])
      .overrideProvider(LEDGER_TOPICS).useValue(TEST_TOPICS)
      .overrideProvider(LOGGER).useValue(logger)
      .compile();

    // AppModule.onApplicationBootstrap() links collaborators and starts routing
    await module.init();

    // house bankroll held by the minter outside the ledger
    await module.get<InMemoryPeggedAssetMinter>(PEGGED_MINTER).mint(ENGINE, Amount.of(1_000));
  }, 10_000);

  afterAll(async () => {
    await module?.close();
  }, 10_000);

  it('announces the collaborator link made at boot', async () => {
    expect(await mockNats.waitForMessage(TEST_TOPICS.LINKED)).toEqual({
      type: 'linked',
      minter: 'pegged-minter',
      registry: 'identity-registry',
    });
    expect(logger.info).toHaveBeenCalledWith('Ledger accepting commands', {
      owner: OWNER,
      engine: ENGINE,
    });
  });

  it('rejects a deposit the native wallet cannot cover', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_DEPOSIT, { caller: ALICE, nativeAmount: '10' });

    expect(await mockNats.waitForMessage(TEST_TOPICS.REQUEST_REJECTED)).toEqual({
      caller: ALICE,
      operation: 'deposit',
      error: 'INSUFFICIENT_NATIVE_FUNDS',
    });
  });

  it('refuses to fund a wallet for anyone but the owner', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_FUND, {
      caller: ALICE,
      identity: ALICE,
      nativeAmount: '10',
    });

    expect(await mockNats.waitForMessage(TEST_TOPICS.REQUEST_REJECTED)).toEqual({
      caller: ALICE,
      operation: 'fundWallet',
      error: 'NOT_OWNER',
    });
  });

  it('credits a deposit command once the owner funded the wallet', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_FUND, {
      caller: OWNER,
      identity: ALICE,
      nativeAmount: '10',
    });
    mockNats.injectMessage(TEST_TOPICS.CMD_DEPOSIT, { caller: ALICE, nativeAmount: '10' });

    expect(await mockNats.waitForMessage(TEST_TOPICS.DEPOSIT)).toEqual({
      type: 'deposit',
      identity: ALICE,
      nativeAmount: '10',
      peggedAmount: '1000',
    });
    const balance = module.get<GetBalanceUseCase>(GET_BALANCE_USE_CASE).execute(ALICE);
    expect(balance.toString()).toBe('1000');
  });

  it('settles a winning play command', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_PLAY, {
      caller: ALICE,
      gameType: 'coin-flip',
      betAmount: '100',
      won: true,
    });

    expect(await mockNats.waitForMessage(TEST_TOPICS.SETTLEMENT)).toEqual({
      type: 'settlement',
      identity: ALICE,
      gameType: 'coin-flip',
      betAmount: '100',
      won: true,
      payout: '190',
      fee: '2',
    });

    const stats = await module.get<GetPlatformStatsUseCase>(GET_PLATFORM_STATS_USE_CASE).execute();
    expect(stats.totalGamesPlayed.toString()).toBe('1');
    expect(stats.totalFeesCollected.toString()).toBe('2');
    expect(stats.custodyBalance.toString()).toBe('2000');
    expect(stats.nativeReserve.toString()).toBe('10');
  });

  it('announces a rejected command to the caller', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_WITHDRAW, { caller: ALICE, peggedAmount: '150' });

    expect(await mockNats.waitForMessage(TEST_TOPICS.REQUEST_REJECTED)).toEqual({
      caller: ALICE,
      operation: 'withdraw',
      error: 'NOT_CONVERTIBLE',
    });
  });

  it('drops a malformed command without touching the ledger', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_PLAY, { caller: ALICE, betAmount: 100 });
    await flushPromises();

    expect(logger.warn).toHaveBeenCalledWith(
      'Invalid NATS command payload',
      expect.objectContaining({ subject: TEST_TOPICS.CMD_PLAY }),
    );
    expect(mockNats.messagesFor(TEST_TOPICS.SETTLEMENT)).toEqual([]);
    expect(mockNats.messagesFor(TEST_TOPICS.REQUEST_REJECTED)).toEqual([]);
    const balance = module.get<GetBalanceUseCase>(GET_BALANCE_USE_CASE).execute(ALICE);
    expect(balance.toString()).toBe('1090');
  });

  it('answers balance, game and stats queries', async () => {
    expect(await mockNats.request(TEST_TOPICS.QUERY_BALANCE, { identity: ALICE })).toEqual({
      identity: ALICE,
      balance: '1090',
    });
    expect(
      await mockNats.request(TEST_TOPICS.QUERY_GAME_CONFIG, { gameType: 'coin-flip' }),
    ).toEqual({
      gameType: 'coin-flip',
      config: {
        minBet: '10',
        maxBet: '10000',
        payoutMultiplierBps: '19000',
        isActive: true,
        displayName: 'Coin Flip',
      },
    });
    expect(await mockNats.request(TEST_TOPICS.QUERY_STATS, {})).toEqual({
      totalGamesPlayed: '1',
      totalVolumeWagered: '100',
      totalPayouts: '190',
      totalFeesCollected: '2',
      nativeReserve: '10',
      custodyBalance: '2000',
      paused: false,
      owner: OWNER,
      treasury: TREASURY,
    });
  });

  it('answers a malformed query with INVALID_REQUEST', async () => {
    expect(await mockNats.request(TEST_TOPICS.QUERY_BALANCE, {})).toEqual({
      error: 'INVALID_REQUEST',
      issues: [{ path: 'identity', message: expect.any(String) }],
    });
  });

  it('adds a game by owner command and lists it', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_GAME_CONFIG, {
      caller: OWNER,
      gameType: 'dice',
      minBet: '50',
      maxBet: '5000',
      payoutMultiplierBps: '30000',
      isActive: true,
      displayName: 'Dice',
    });

    const dice = {
      minBet: '50',
      maxBet: '5000',
      payoutMultiplierBps: '30000',
      isActive: true,
      displayName: 'Dice',
    };
    expect(await mockNats.waitForMessage(TEST_TOPICS.CONFIG_UPDATED)).toEqual({
      type: 'config_updated',
      gameType: 'dice',
      config: dice,
    });
    const listing = await mockNats.request(TEST_TOPICS.QUERY_GAME_CONFIG, {});
    expect(listing).toEqual({
      games: [
        { gameType: 'coin-flip', config: expect.objectContaining({ displayName: 'Coin Flip' }) },
        { gameType: 'dice', config: dice },
      ],
    });
  });

  it('grants a capability by owner command', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_CAPABILITY, {
      caller: OWNER,
      capability: 'GAME_MANAGER',
      identity: 'ops-service',
      granted: true,
    });

    expect(await mockNats.waitForMessage(TEST_TOPICS.CAPABILITY_GRANTED)).toEqual({
      type: 'capability_granted',
      capability: 'GAME_MANAGER',
      identity: 'ops-service',
    });
  });

  it('bans an identity and refuses its play until unbanned', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_IDENTITY, { caller: OWNER, identity: ALICE, action: 'ban' });
    mockNats.injectMessage(TEST_TOPICS.CMD_PLAY, {
      caller: ALICE,
      gameType: 'coin-flip',
      betAmount: '10',
      won: false,
    });

    expect(await mockNats.waitForMessage(TEST_TOPICS.REQUEST_REJECTED)).toEqual({
      caller: ALICE,
      operation: 'playGame',
      error: 'INELIGIBLE_IDENTITY',
    });

    mockNats.injectMessage(TEST_TOPICS.CMD_IDENTITY, {
      caller: OWNER,
      identity: ALICE,
      action: 'unban',
    });
    mockNats.injectMessage(TEST_TOPICS.CMD_PLAY, {
      caller: ALICE,
      gameType: 'coin-flip',
      betAmount: '10',
      won: false,
    });

    expect(await mockNats.waitForMessage(TEST_TOPICS.SETTLEMENT)).toMatchObject({
      identity: ALICE,
      betAmount: '10',
      won: false,
    });
  });

  it('pauses and unpauses by owner command', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_PAUSE, { caller: OWNER, paused: true });
    expect(await mockNats.waitForMessage(TEST_TOPICS.PAUSED)).toEqual({
      type: 'paused',
      by: OWNER,
    });

    mockNats.injectMessage(TEST_TOPICS.CMD_DEPOSIT, { caller: BOB, nativeAmount: '1' });
    expect(await mockNats.waitForMessage(TEST_TOPICS.REQUEST_REJECTED)).toEqual({
      caller: BOB,
      operation: 'deposit',
      error: 'ENGINE_PAUSED',
    });

    mockNats.injectMessage(TEST_TOPICS.CMD_PAUSE, { caller: OWNER, paused: false });
    expect(await mockNats.waitForMessage(TEST_TOPICS.UNPAUSED)).toEqual({
      type: 'unpaused',
      by: OWNER,
    });
  });

  it('moves the treasury and pays accrued fees to it', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_TREASURY, { caller: OWNER, treasury: 'treasury-2' });
    expect(await mockNats.waitForMessage(TEST_TOPICS.TREASURY_UPDATED)).toEqual({
      type: 'treasury_updated',
      previous: TREASURY,
      current: 'treasury-2',
    });

    mockNats.injectMessage(TEST_TOPICS.CMD_WITHDRAW_FEES, { caller: OWNER });
    // 2 pegged units of fees floor to zero native
    expect(await mockNats.waitForMessage(TEST_TOPICS.FEE_COLLECTED)).toEqual({
      type: 'fee_collected',
      amount: '2',
      nativeAmount: '0',
      treasury: 'treasury-2',
    });
  });

  it('hands ownership over so the old owner is refused', async () => {
    mockNats.injectMessage(TEST_TOPICS.CMD_TRANSFER_OWNERSHIP, {
      caller: OWNER,
      newOwner: 'owner-2',
    });
    expect(await mockNats.waitForMessage(TEST_TOPICS.OWNERSHIP_TRANSFERRED)).toEqual({
      type: 'ownership_transferred',
      previous: OWNER,
      current: 'owner-2',
    });

    mockNats.injectMessage(TEST_TOPICS.CMD_PAUSE, { caller: OWNER, paused: true });
    expect(await mockNats.waitForMessage(TEST_TOPICS.REQUEST_REJECTED)).toEqual({
      caller: OWNER,
      operation: 'setPaused',
      error: 'NOT_OWNER',
    });

    const stats = await mockNats.request(TEST_TOPICS.QUERY_STATS, {});
    expect(stats).toMatchObject({ owner: 'owner-2', treasury: 'treasury-2', paused: false });
  });
});
