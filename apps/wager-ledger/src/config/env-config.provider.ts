import { Provider } from '@nestjs/common';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Identity } from '@shared/kernel/Identity';
import { LedgerTopics, createTopics } from '@messaging/topics';
import { LEDGER_TOPICS } from '@messaging/tokens';
import { ledgerConfigSchema, RawLedgerConfig } from './ledger-config.schema';
import { loadGamesFile } from './games-file.schema';

export const VALIDATED_ENV = 'VALIDATED_ENV';
export const LEDGER_SETTINGS = 'LEDGER_SETTINGS';
export const INITIAL_GAMES = 'INITIAL_GAMES';

/** Identities and switches the ledger is constructed with. */
export interface LedgerSettings {
  ownerId: Identity;
  engineAddress: Identity;
  treasuryId: Identity | null;
  requireRegistration: boolean;
}

/**
 * Runs Zod validation once at boot. All other providers
 * derive their values from this single source of truth.
 */
export const validatedEnvProvider: Provider<RawLedgerConfig> = {
  provide: VALIDATED_ENV,
  useFactory: (): RawLedgerConfig => {
    const result = ledgerConfigSchema.safeParse({
      LEDGER_ID: process.env.LEDGER_ID,
      OWNER_ID: process.env.OWNER_ID,
      ENGINE_ADDRESS: process.env.ENGINE_ADDRESS,
      TREASURY_ID: process.env.TREASURY_ID,
      GAMES_FILE: process.env.GAMES_FILE,
      REQUIRE_REGISTRATION: process.env.REQUIRE_REGISTRATION,
      NATS_URL: process.env.NATS_URL,
    });

    if (!result.success) {
      const messages = result.error.issues
        .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');
      throw new Error(`[LedgerConfig] Invalid environment variables:\n${messages}`);
    }

    return result.data;
  },
};

export const ledgerSettingsProvider: Provider<LedgerSettings> = {
  provide: LEDGER_SETTINGS,
  useFactory: (env: RawLedgerConfig): LedgerSettings => ({
    ownerId: env.OWNER_ID,
    engineAddress: env.ENGINE_ADDRESS,
    treasuryId: env.TREASURY_ID ?? null,
    requireRegistration: env.REQUIRE_REGISTRATION,
  }),
  inject: [VALIDATED_ENV],
};

export const initialGamesProvider: Provider<Array<[string, GameConfig]>> = {
  provide: INITIAL_GAMES,
  useFactory: (env: RawLedgerConfig): Array<[string, GameConfig]> =>
    loadGamesFile(env.GAMES_FILE),
  inject: [VALIDATED_ENV],
};

/**
 * Infrastructure-only: ledger-scoped NATS subjects.
 * Domain and application layers never see this.
 */
export const ledgerTopicsProvider: Provider<LedgerTopics> = {
  provide: LEDGER_TOPICS,
  useFactory: (env: RawLedgerConfig): LedgerTopics => createTopics(env.LEDGER_ID),
  inject: [VALIDATED_ENV],
};
