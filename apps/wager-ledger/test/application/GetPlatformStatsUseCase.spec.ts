import { Amount } from '@shared/kernel/Amount';
import {
  ALICE,
  OWNER,
  TREASURY,
  createTestLedger,
  fundAndDeposit,
  seedBankroll,
} from '../integration/helpers/test-ledger';

describe('GetPlatformStatsUseCase', () => {
  it('reports an empty ledger', async () => {
    const ledger = createTestLedger();
    const stats = await ledger.getPlatformStats.execute();

    expect(stats.totalGamesPlayed.isZero()).toBe(true);
    expect(stats.totalVolumeWagered.isZero()).toBe(true);
    expect(stats.totalPayouts.isZero()).toBe(true);
    expect(stats.totalFeesCollected.isZero()).toBe(true);
    expect(stats.nativeReserve.isZero()).toBe(true);
    expect(stats.custodyBalance.isZero()).toBe(true);
    expect(stats.paused).toBe(false);
    expect(stats.owner).toBe(OWNER);
    expect(stats.treasury).toBe(TREASURY);
  });

  it('reports reserve, custody and counters after activity', async () => {
    const ledger = createTestLedger();
    await fundAndDeposit(ledger, ALICE, 3);
    await seedBankroll(ledger, 500);
    await ledger.playGame.execute({
      caller: ALICE,
      gameType: 'coin-flip',
      betAmount: Amount.of(200),
      won: true,
    });
    await ledger.setPaused.execute(OWNER, true);

    const stats = await ledger.getPlatformStats.execute();
    expect(stats.totalGamesPlayed.toBigInt()).toBe(1n);
    expect(stats.totalVolumeWagered.toBigInt()).toBe(200n);
    expect(stats.totalPayouts.toBigInt()).toBe(380n);
    expect(stats.totalFeesCollected.toBigInt()).toBe(5n);
    expect(stats.nativeReserve.toBigInt()).toBe(3n);
    expect(stats.custodyBalance.toBigInt()).toBe(800n);
    expect(stats.paused).toBe(true);
  });

  it('reports zero custody when no minter is linked', async () => {
    const ledger = createTestLedger({ link: false, treasury: null });
    const stats = await ledger.getPlatformStats.execute();
    expect(stats.custodyBalance.isZero()).toBe(true);
    expect(stats.treasury).toBeNull();
  });
});
