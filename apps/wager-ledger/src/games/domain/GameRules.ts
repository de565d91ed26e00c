import { Amount } from '@shared/kernel/Amount';
import { GameConfig } from '@shared/kernel/GameConfig';
import {
  BetAboveMaxError,
  BetBelowMinError,
  GameInactiveError,
} from '@shared/kernel/DomainError';

/**
 * Play-time check of a bet against its game's config. This is the only
 * place `minBet <= maxBet` is effectively enforced: with the pair reversed
 * no bet passes both bounds.
 */
export function assertPlayable(gameType: string, config: GameConfig, bet: Amount): void {
  if (!config.isActive) {
    throw new GameInactiveError(`Game type "${gameType}" is not active`);
  }
  if (bet.isLessThan(config.minBet)) {
    throw new BetBelowMinError(`Bet ${bet} is below minimum ${config.minBet}`);
  }
  if (bet.isGreaterThan(config.maxBet)) {
    throw new BetAboveMaxError(`Bet ${bet} is above maximum ${config.maxBet}`);
  }
}
