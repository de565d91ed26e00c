import {
  Module,
  OnApplicationBootstrap,
  OnApplicationShutdown,
  Inject,
} from '@nestjs/common';
import { LedgerConfigModule } from './config/config.module';
import { MessagingModule } from './messaging/messaging.module';
import { LEDGER_SETTINGS, LedgerSettings } from '@config/env-config.provider';
import { LOGGER } from '@messaging/tokens';
import { Logger } from '@shared/ports/Logger';
import { PeggedAssetMinter } from '@shared/ports/PeggedAssetMinter';
import { IdentityRegistry } from '@shared/ports/IdentityRegistry';
import { LinkCollaboratorsUseCase } from '@ledger/application/LinkCollaboratorsUseCase';
import { ServeLedgerCommandsUseCase } from '@ledger/application/ServeLedgerCommandsUseCase';
import {
  LedgerModule,
  PEGGED_MINTER,
  IDENTITY_REGISTRY,
  LINK_COLLABORATORS_USE_CASE,
  SERVE_LEDGER_COMMANDS_USE_CASE,
} from '@ledger/infrastructure/ledger.module';

@Module({
  imports: [LedgerConfigModule, MessagingModule, LedgerModule],
})
export class AppModule
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  constructor(
    @Inject(LEDGER_SETTINGS) private readonly settings: LedgerSettings,
    @Inject(PEGGED_MINTER) private readonly minter: PeggedAssetMinter,
    @Inject(IDENTITY_REGISTRY) private readonly registry: IdentityRegistry,
    @Inject(LINK_COLLABORATORS_USE_CASE)
    private readonly linkCollaborators: LinkCollaboratorsUseCase,
    @Inject(SERVE_LEDGER_COMMANDS_USE_CASE)
    private readonly commands: ServeLedgerCommandsUseCase,
    @Inject(LOGGER) private readonly logger: Logger,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const linked = await this.linkCollaborators.execute({
      caller: this.settings.ownerId,
      minter: this.minter,
      registry: this.registry,
    });
    if (!linked.success) {
      throw new Error(`Linking collaborators failed: ${linked.error}`);
    }

    this.commands.start();
    this.logger.info('Ledger accepting commands', {
      owner: this.settings.ownerId,
      engine: this.settings.engineAddress,
    });
  }

  async onApplicationShutdown(): Promise<void> {
    await this.commands.stop();
  }
}
