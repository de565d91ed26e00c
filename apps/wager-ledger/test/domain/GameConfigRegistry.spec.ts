import { Amount } from '@shared/kernel/Amount';
import { GameConfig } from '@shared/kernel/GameConfig';
import {
  BetAboveMaxError,
  BetBelowMinError,
  GameInactiveError,
  UnknownGameError,
} from '@shared/kernel/DomainError';
import { GameConfigRegistry } from '@games/domain/GameConfigRegistry';
import { assertPlayable } from '@games/domain/GameRules';

const makeConfig = (overrides?: Partial<GameConfig>): GameConfig => ({
  minBet: Amount.of(10),
  maxBet: Amount.of(1_000),
  payoutMultiplierBps: 19_000n,
  isActive: true,
  displayName: 'Coin Flip',
  ...overrides,
});

describe('GameConfigRegistry', () => {
  it('returns undefined for an unknown game', () => {
    expect(new GameConfigRegistry().get('coin-flip')).toBeUndefined();
  });

  it('require throws UnknownGameError for an unknown game', () => {
    expect(() => new GameConfigRegistry().require('coin-flip')).toThrow(UnknownGameError);
  });

  it('replaces the whole tuple on set', () => {
    const registry = new GameConfigRegistry([['coin-flip', makeConfig()]]);
    registry.set('coin-flip', makeConfig({ isActive: false, displayName: 'Retired' }));

    const stored = registry.require('coin-flip');
    expect(stored.isActive).toBe(false);
    expect(stored.displayName).toBe('Retired');
  });

  it('stores a frozen copy', () => {
    const config = makeConfig();
    const registry = new GameConfigRegistry();
    registry.set('coin-flip', config);

    const stored = registry.require('coin-flip');
    expect(stored).not.toBe(config);
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it('accepts minBet above maxBet', () => {
    const registry = new GameConfigRegistry();
    registry.set('odd', makeConfig({ minBet: Amount.of(500), maxBet: Amount.of(100) }));
    expect(registry.require('odd').minBet.toBigInt()).toBe(500n);
  });

  it('lists every game', () => {
    const registry = new GameConfigRegistry([
      ['coin-flip', makeConfig()],
      ['dice', makeConfig({ displayName: 'Dice' })],
    ]);
    expect(registry.list().map(([gameType]) => gameType)).toEqual(['coin-flip', 'dice']);
  });

  it('clones independently', () => {
    const registry = new GameConfigRegistry([['coin-flip', makeConfig()]]);
    const copy = registry.clone();
    copy.set('dice', makeConfig());
    expect(registry.get('dice')).toBeUndefined();
  });
});

describe('assertPlayable', () => {
  it('passes a bet on the bounds', () => {
    expect(() => assertPlayable('coin-flip', makeConfig(), Amount.of(10))).not.toThrow();
    expect(() => assertPlayable('coin-flip', makeConfig(), Amount.of(1_000))).not.toThrow();
  });

  it('rejects an inactive game before looking at the bet', () => {
    const config = makeConfig({ isActive: false });
    expect(() => assertPlayable('coin-flip', config, Amount.of(1))).toThrow(GameInactiveError);
  });

  it('rejects a bet below the minimum', () => {
    expect(() => assertPlayable('coin-flip', makeConfig(), Amount.of(9))).toThrow(
      BetBelowMinError,
    );
  });

  it('rejects a bet above the maximum', () => {
    expect(() => assertPlayable('coin-flip', makeConfig(), Amount.of(1_001))).toThrow(
      BetAboveMaxError,
    );
  });

  it('rejects every bet when minBet exceeds maxBet', () => {
    const config = makeConfig({ minBet: Amount.of(500), maxBet: Amount.of(100) });
    expect(() => assertPlayable('odd', config, Amount.of(100))).toThrow(BetBelowMinError);
    expect(() => assertPlayable('odd', config, Amount.of(500))).toThrow(BetAboveMaxError);
  });
});
