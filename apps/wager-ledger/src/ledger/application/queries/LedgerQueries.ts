import { Amount } from '@shared/kernel/Amount';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Identity } from '@shared/kernel/Identity';

export interface BalanceQuery {
  identity: Identity;
}

export interface BalanceView {
  identity: Identity;
  balance: Amount;
}

export interface GameConfigQuery {
  /** Omitted: every configured game. */
  gameType?: string;
}

export type GameConfigView =
  | { gameType: string; config: GameConfig | null }
  | { games: Array<{ gameType: string; config: GameConfig }> };

export type StatsQuery = Record<string, unknown>;
