import { Amount } from '@shared/kernel/Amount';
import { Rejection } from '@ledger/application/LedgerResult';

export type DepositResult =
  | { success: true; peggedAmount: Amount; balance: Amount }
  | Rejection;
