import { Identity } from '@shared/kernel/Identity';

export interface TransferOwnershipCommand {
  caller: Identity;
  newOwner: Identity;
}
