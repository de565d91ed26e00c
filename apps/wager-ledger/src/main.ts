import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);

  app.enableShutdownHooks();

  console.log(`[WagerLedger] Ledger started: ${process.env.LEDGER_ID}`);

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log(`[WagerLedger] Received ${signal}, shutting down...`);

    await app.close();
    console.log('[WagerLedger] Shutdown complete');
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err) => {
      console.error('[WagerLedger] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

bootstrap().catch((err) => {
  console.error('[WagerLedger] Fatal bootstrap error:', err);
  process.exit(1);
});
