import { Identity } from '@shared/kernel/Identity';
import { LedgerErrorCode } from '@shared/kernel/DomainError';

export interface RequestRejectedNotifier {
  requestRejected(
    caller: Identity,
    operation: string,
    error: LedgerErrorCode,
  ): Promise<void>;
}
