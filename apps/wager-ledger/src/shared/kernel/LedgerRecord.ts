import { Amount } from '@shared/kernel/Amount';
import { Capability } from '@shared/kernel/Capability';
import { GameConfig } from '@shared/kernel/GameConfig';
import { Identity } from '@shared/kernel/Identity';

export type LedgerRecord =
  | {
      type: 'deposit';
      identity: Identity;
      nativeAmount: Amount;
      peggedAmount: Amount;
    }
  | {
      type: 'withdrawal';
      identity: Identity;
      peggedAmount: Amount;
      nativeAmount: Amount;
    }
  | {
      type: 'settlement';
      identity: Identity;
      gameType: string;
      betAmount: Amount;
      won: boolean;
      payout: Amount;
      fee: Amount;
    }
  | {
      type: 'fee_collected';
      amount: Amount;
      nativeAmount: Amount;
      treasury: Identity;
    }
  | { type: 'config_updated'; gameType: string; config: GameConfig }
  | { type: 'treasury_updated'; previous: Identity | null; current: Identity }
  | { type: 'linked'; minter: Identity | null; registry: Identity | null }
  | { type: 'paused'; by: Identity }
  | { type: 'unpaused'; by: Identity }
  | { type: 'capability_granted'; capability: Capability; identity: Identity }
  | { type: 'capability_revoked'; capability: Capability; identity: Identity }
  | { type: 'ownership_transferred'; previous: Identity; current: Identity };

export type LedgerRecordType = LedgerRecord['type'];

/** A record as it sits in the append-only log. */
export type LoggedRecord = Readonly<LedgerRecord> & {
  readonly sequence: number;
  readonly recordedAt: number;
};
