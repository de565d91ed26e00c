import { Provider } from '@nestjs/common';
import { connect, ConnectionOptions, DebugEvents, Events, NatsConnection } from 'nats';
import { Logger } from '@shared/ports/Logger';
import { RawLedgerConfig } from '@config/ledger-config.schema';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { NATS_CONNECTION, LOGGER } from './tokens';

/**
 * One connection per ledger instance. The client name carries the ledger
 * id so server-side monitoring (`nats server report connections`) tells
 * ledgers sharing a cluster apart.
 */
export function natsConnectionOptions(env: RawLedgerConfig): ConnectionOptions {
  return {
    servers: env.NATS_URL,
    name: `wager-ledger:${env.LEDGER_ID}`,
    maxReconnectAttempts: -1,
    reconnectTimeWait: 2_000,
    waitOnFirstConnect: true,
  };
}

interface StatusLogEntry {
  level: 'warn' | 'error';
  message: string;
}

const STATUS_LOG: ReadonlyMap<string, StatusLogEntry> = new Map<string, StatusLogEntry>([
  [Events.Disconnect, { level: 'warn', message: 'NATS disconnected' }],
  [Events.Reconnect, { level: 'warn', message: 'NATS reconnected' }],
  [Events.LDM, { level: 'warn', message: 'NATS server entering lame duck mode' }],
  [Events.Error, { level: 'error', message: 'NATS error' }],
  [DebugEvents.Reconnecting, { level: 'warn', message: 'NATS reconnecting' }],
]);

/** Logs connection state changes until the connection closes. */
export function watchConnectionStatus(
  nc: NatsConnection,
  logger: Logger,
  ledgerId: string,
): void {
  (async () => {
    for await (const status of nc.status()) {
      const entry = STATUS_LOG.get(status.type);
      if (!entry) continue;
      logger[entry.level](entry.message, { ledgerId, data: String(status.data) });
    }
  })().catch((err: unknown) => {
    logger.error('NATS status monitor crashed', {
      ledgerId,
      error: err instanceof Error ? err.message : String(err),
    });
  });
}

export const natsConnectionProvider: Provider<NatsConnection> = {
  provide: NATS_CONNECTION,
  useFactory: async (env: RawLedgerConfig, logger: Logger): Promise<NatsConnection> => {
    const options = natsConnectionOptions(env);
    const nc = await connect(options);
    logger.info('NATS connected', { servers: env.NATS_URL, name: options.name });
    watchConnectionStatus(nc, logger, env.LEDGER_ID);
    return nc;
  },
  inject: [VALIDATED_ENV, LOGGER],
};
