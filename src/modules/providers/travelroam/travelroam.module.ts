import { Module, OnModuleInit } from '@nestjs/common';
import { CoreModule } from '../../../core/core.module';
import { ProviderRegistry } from '../../../core/providers';
import { BUNDLE_CATALOG } from '../../../domain/esim';
import { TravelroamAdapter } from './adapters/travelroam-adapter.service';
import { TravelroamApiClientService } from './adapters/travelroam-api-client.service';
import { TravelroamBundleCatalog } from './adapters/travelroam-bundle-catalog.service';
import { BundleMatcherService } from './services/bundle-matcher.service';

@Module({
  imports: [CoreModule],
  providers: [
    TravelroamApiClientService,
    TravelroamAdapter,
    { provide: BUNDLE_CATALOG, useClass: TravelroamBundleCatalog },
    BundleMatcherService,
  ],
  exports: [TravelroamAdapter, BUNDLE_CATALOG, BundleMatcherService],
})
export class TravelroamModule implements OnModuleInit {
  constructor(
    private readonly providerRegistry: ProviderRegistry,
    private readonly travelroamAdapter: TravelroamAdapter,
  ) {}

  onModuleInit() {
    this.providerRegistry.registerProvider(this.travelroamAdapter);
  }
}
