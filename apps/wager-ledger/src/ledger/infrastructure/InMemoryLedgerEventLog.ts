import { Injectable } from '@nestjs/common';
import { LedgerRecord, LedgerRecordType, LoggedRecord } from '@shared/kernel/LedgerRecord';
import { LedgerEventPublisher } from '@ledger/application/ports/LedgerEventPublisher';

/** Append-only log of committed records. Entries are frozen. */
@Injectable()
export class InMemoryLedgerEventLog implements LedgerEventPublisher {
  private readonly entries: LoggedRecord[] = [];

  constructor(private readonly clock: () => number = Date.now) {}

  async publish(records: readonly LedgerRecord[]): Promise<void> {
    const recordedAt = this.clock();
    for (const record of records) {
      this.entries.push(
        Object.freeze({ ...record, sequence: this.entries.length + 1, recordedAt }),
      );
    }
  }

  all(): readonly LoggedRecord[] {
    return [...this.entries];
  }

  ofType<K extends LedgerRecordType>(type: K): Array<Extract<LoggedRecord, { type: K }>> {
    return this.entries.filter(
      (entry): entry is Extract<LoggedRecord, { type: K }> => entry.type === type,
    );
  }

  get size(): number {
    return this.entries.length;
  }
}
