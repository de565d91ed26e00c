import { Identity } from '@shared/kernel/Identity';
import { PeggedAssetMinter } from '@shared/ports/PeggedAssetMinter';
import { IdentityRegistry } from '@shared/ports/IdentityRegistry';

export interface LinkCollaboratorsCommand {
  caller: Identity;
  /** `null` unlinks. */
  minter: PeggedAssetMinter | null;
  /** `null` unlinks; identity and stat checks are then skipped. */
  registry: IdentityRegistry | null;
}
