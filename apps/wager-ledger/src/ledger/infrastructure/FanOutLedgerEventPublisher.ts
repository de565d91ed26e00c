import { LedgerRecord } from '@shared/kernel/LedgerRecord';
import { LedgerEventPublisher } from '@ledger/application/ports/LedgerEventPublisher';

/** Hands the same committed batch to every publisher, in order. */
export class FanOutLedgerEventPublisher implements LedgerEventPublisher {
  constructor(private readonly publishers: readonly LedgerEventPublisher[]) {}

  async publish(records: readonly LedgerRecord[]): Promise<void> {
    for (const publisher of this.publishers) {
      await publisher.publish(records);
    }
  }
}
