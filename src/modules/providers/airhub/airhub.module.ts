import { Module, OnModuleInit } from '@nestjs/common';
import { CoreModule } from '../../../core/core.module';
import { ProviderRegistry } from '../../../core/providers';
import { AirhubAdapter } from './adapters/airhub-adapter.service';
import { AirhubApiClientService } from './adapters/airhub-api-client.service';

@Module({
  imports: [CoreModule],
  providers: [AirhubApiClientService, AirhubAdapter],
  exports: [AirhubAdapter],
})
export class AirhubModule implements OnModuleInit {
  constructor(
    private readonly providerRegistry: ProviderRegistry,
    private readonly airhubAdapter: AirhubAdapter,
  ) {}

  onModuleInit() {
    this.providerRegistry.registerProvider(this.airhubAdapter);
  }
}
