import { Rejection } from '@ledger/application/LedgerResult';

export type AdminResult = { success: true } | Rejection;
