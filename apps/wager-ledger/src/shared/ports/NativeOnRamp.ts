import { Amount } from '@shared/kernel/Amount';
import { Identity } from '@shared/kernel/Identity';

/** Brings native asset into an outside wallet, e.g. a faucet or a fiat on-ramp. */
export interface NativeOnRamp {
  fund(identity: Identity, amount: Amount): void;
}
