import { Identity } from '@shared/kernel/Identity';

/** Write side of the identity registry. */
export interface IdentityEnrollment {
  register(identity: Identity): void;
  ban(identity: Identity): void;
  unban(identity: Identity): void;
}
