import { Identity } from '@shared/kernel/Identity';

export type IdentityAction = 'register' | 'ban' | 'unban';

export interface SetIdentityStatusCommand {
  caller: Identity;
  identity: Identity;
  action: IdentityAction;
}
