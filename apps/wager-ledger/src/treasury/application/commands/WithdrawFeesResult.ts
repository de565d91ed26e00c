import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';
import { Rejection } from '@ledger/application/LedgerResult';

export type WithdrawFeesResult =
  | { success: true; amount: Amount; nativeAmount: Amount; treasury: Identity }
  | Rejection;
