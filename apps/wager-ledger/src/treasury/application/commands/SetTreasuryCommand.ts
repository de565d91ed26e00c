import { Identity } from '@shared/kernel/Identity';

export interface SetTreasuryCommand {
  caller: Identity;
  treasury: Identity;
}
