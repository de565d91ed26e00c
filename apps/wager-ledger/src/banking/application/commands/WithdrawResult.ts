import { Amount } from '@shared/kernel/Amount';
import { Rejection } from '@ledger/application/LedgerResult';

export type WithdrawResult =
  | { success: true; nativeAmount: Amount; balance: Amount }
  | Rejection;
