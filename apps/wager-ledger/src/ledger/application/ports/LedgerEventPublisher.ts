import { LedgerRecord } from '@shared/kernel/LedgerRecord';

export interface LedgerEventPublisher {
  /**
   * Called once per committed request with the records it produced, in
   * order. Must not throw for transport failures.
   */
  publish(records: readonly LedgerRecord[]): Promise<void>;
}
