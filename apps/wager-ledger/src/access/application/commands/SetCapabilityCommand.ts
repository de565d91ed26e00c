import { Capability } from '@shared/kernel/Capability';
import { Identity } from '@shared/kernel/Identity';

export interface SetCapabilityCommand {
  caller: Identity;
  capability: Capability;
  identity: Identity;
  /** `true` authorizes, `false` revokes. */
  granted: boolean;
}
