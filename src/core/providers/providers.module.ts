import { Global, Module } from '@nestjs/common';
import { ProviderRegistry } from './provider-registry.service';

/**
 * Global so every provider module registers its adapter with the same
 * registry that reconciliation and renewals read from
 */
@Global()
@Module({
  providers: [ProviderRegistry],
  exports: [ProviderRegistry],
})
export class ProvidersModule {}
