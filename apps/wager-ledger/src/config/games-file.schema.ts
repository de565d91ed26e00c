import { readFileSync } from 'fs';
import { z } from 'zod';
import { GameConfig } from '@shared/kernel/GameConfig';
import { amountSchema, bpsSchema } from '@messaging/schemas';

const gameEntrySchema = z.object({
  gameType: z.string().trim().min(1),
  displayName: z.string(),
  minBet: amountSchema,
  maxBet: amountSchema,
  payoutMultiplierBps: bpsSchema,
  isActive: z.boolean(),
});

/**
 * Game table loaded at boot. `minBet > maxBet` is accepted here just as
 * it is by setGameConfig: the game exists but takes no bets.
 */
export const gamesFileSchema = z
  .array(gameEntrySchema)
  .refine(
    (games) => new Set(games.map((g) => g.gameType)).size === games.length,
    { message: 'gameType values must be unique' },
  );

export function parseGamesFile(raw: unknown): Array<[string, GameConfig]> {
  const result = gamesFileSchema.safeParse(raw);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`[LedgerConfig] Invalid games file:\n${messages}`);
  }

  return result.data.map((g): [string, GameConfig] => [
    g.gameType,
    {
      minBet: g.minBet,
      maxBet: g.maxBet,
      payoutMultiplierBps: g.payoutMultiplierBps,
      isActive: g.isActive,
      displayName: g.displayName,
    },
  ]);
}

export function loadGamesFile(path: string): Array<[string, GameConfig]> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new Error(
      `[LedgerConfig] Cannot read games file "${path}": ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
  }
  return parseGamesFile(raw);
}
