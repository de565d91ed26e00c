import { Injectable, Inject } from '@nestjs/common';
import { NatsConnection } from 'nats';
import { Identity } from '@shared/kernel/Identity';
import { LedgerErrorCode } from '@shared/kernel/DomainError';
import { LedgerRecord, LedgerRecordType } from '@shared/kernel/LedgerRecord';
import { Logger } from '@shared/ports/Logger';
import { LedgerEventPublisher } from '@ledger/application/ports/LedgerEventPublisher';
import { RequestRejectedNotifier } from '@ledger/application/ports/RequestRejectedNotifier';
import { LedgerTopics } from './topics';
import { toWire } from './wire';
import { NATS_CONNECTION, LEDGER_TOPICS, LOGGER } from './tokens';

const SUBJECT_BY_TYPE: Record<LedgerRecordType, keyof LedgerTopics> = {
  deposit: 'DEPOSIT',
  withdrawal: 'WITHDRAWAL',
  settlement: 'SETTLEMENT',
  fee_collected: 'FEE_COLLECTED',
  config_updated: 'CONFIG_UPDATED',
  treasury_updated: 'TREASURY_UPDATED',
  linked: 'LINKED',
  paused: 'PAUSED',
  unpaused: 'UNPAUSED',
  capability_granted: 'CAPABILITY_GRANTED',
  capability_revoked: 'CAPABILITY_REVOKED',
  ownership_transferred: 'OWNERSHIP_TRANSFERRED',
};

@Injectable()
export class NatsLedgerEventPublisher
  implements LedgerEventPublisher, RequestRejectedNotifier
{
  private readonly encoder = new TextEncoder();

  constructor(
    @Inject(NATS_CONNECTION) private readonly nats: NatsConnection,
    @Inject(LEDGER_TOPICS) private readonly topics: LedgerTopics,
    @Inject(LOGGER) private readonly logger: Logger,
  ) {}

  async publish(records: readonly LedgerRecord[]): Promise<void> {
    for (const record of records) {
      this.safePublish(this.topics[SUBJECT_BY_TYPE[record.type]], toWire(record));
    }
  }

  async requestRejected(
    caller: Identity,
    operation: string,
    error: LedgerErrorCode,
  ): Promise<void> {
    this.safePublish(this.topics.REQUEST_REJECTED, { caller, operation, error });
  }

  /**
   * Publishes a JSON payload to the given NATS subject.
   * Logs and drops any error: by the time records are published the
   * request is already committed.
   */
  private safePublish(subject: string, payload: unknown): void {
    try {
      this.nats.publish(subject, this.encoder.encode(JSON.stringify(payload)));
    } catch (err) {
      this.logger.error('NATS publish failed', {
        subject,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
