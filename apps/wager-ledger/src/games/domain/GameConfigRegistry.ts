import { GameConfig } from '@shared/kernel/GameConfig';
import { UnknownGameError } from '@shared/kernel/DomainError';

export class GameConfigRegistry {
  private readonly configs: Map<string, GameConfig>;

  constructor(entries?: Iterable<[string, GameConfig]>) {
    this.configs = new Map(entries);
  }

  get(gameType: string): GameConfig | undefined {
    return this.configs.get(gameType);
  }

  require(gameType: string): GameConfig {
    const config = this.configs.get(gameType);
    if (!config) {
      throw new UnknownGameError(`Unknown game type "${gameType}"`);
    }
    return config;
  }

  /** Replaces the whole tuple; no cross-field validation. */
  set(gameType: string, config: GameConfig): void {
    this.configs.set(gameType, Object.freeze({ ...config }));
  }

  list(): Array<[string, GameConfig]> {
    return [...this.configs.entries()];
  }

  clone(): GameConfigRegistry {
    return new GameConfigRegistry(this.configs);
  }
}
