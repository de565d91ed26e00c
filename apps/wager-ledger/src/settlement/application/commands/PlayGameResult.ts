import { Amount } from '@shared/kernel/Amount';
import { Rejection } from '@ledger/application/LedgerResult';

export type PlayGameResult =
  | { success: true; fee: Amount; payout: Amount; balance: Amount }
  | Rejection;
