import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { LEDGER_TOPICS } from '@messaging/tokens';
import {
  validatedEnvProvider,
  ledgerSettingsProvider,
  initialGamesProvider,
  ledgerTopicsProvider,
  VALIDATED_ENV,
  LEDGER_SETTINGS,
  INITIAL_GAMES,
} from './env-config.provider';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [
    validatedEnvProvider,
    ledgerSettingsProvider,
    initialGamesProvider,
    ledgerTopicsProvider,
  ],
  exports: [VALIDATED_ENV, LEDGER_SETTINGS, INITIAL_GAMES, LEDGER_TOPICS],
})
export class LedgerConfigModule {}
