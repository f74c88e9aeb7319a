import { Module, OnModuleInit } from '@nestjs/common';
import { CoreModule } from '../../../core/core.module';
import { ProviderRegistry } from '../../../core/providers';
import { EsimcardAdapter } from './adapters/esimcard-adapter.service';
import { EsimcardApiClientService } from './adapters/esimcard-api-client.service';

@Module({
  imports: [CoreModule],
  providers: [EsimcardApiClientService, EsimcardAdapter],
  exports: [EsimcardAdapter],
})
export class EsimcardModule implements OnModuleInit {
  constructor(
    private readonly providerRegistry: ProviderRegistry,
    private readonly esimcardAdapter: EsimcardAdapter,
  ) {}

  onModuleInit() {
    this.providerRegistry.registerProvider(this.esimcardAdapter);
  }
}
